// Типы модуля поиска направлений.

// Запрос на поиск. Необязательные поля получают значения по умолчанию.
export interface DestinationSearchQuery {
  q: string;
  limit?: number;
  offset?: number;
  includeCountry?: boolean;
  includeCity?: boolean;
}

// Элемент результата: узкая проекция для списков и автодополнения.
export interface DestinationSearchResult {
  id: string;
  name: string;
  country: string | null;
  city: string | null;
  popularity: number | null;
  // Триграммная близость запроса к лучшему из полей поиска (0..1).
  score: number | null;
}

// Страница результатов.
export interface DestinationSearchResponse {
  // Общее число совпадений без учета пагинации.
  total: number;
  limit: number;
  offset: number;
  items: DestinationSearchResult[];
}
