// TypeScript-типы строк таблиц PostgreSQL.

// Строка таблицы trips. Даты (DATE) приходят строками YYYY-MM-DD.
export interface TripRow {
  id: string;
  name: string;
  start_date: string | null;
  end_date: string | null;
  created_at: Date;
}

// Строка таблицы destinations.
export interface DestinationRow {
  id: string;
  name: string;
  country: string | null;
  city: string | null;
  description: string | null;
  popularity: number | null;
}

// Строка результата поиска направлений: узкая проекция плюс триграммная оценка.
export interface DestinationSearchRow {
  id: string;
  name: string;
  country: string | null;
  city: string | null;
  popularity: number | null;
  score: number | null;
}

// Строка таблицы itinerary_items: пункт маршрута.
export interface ItineraryItemRow {
  id: string;
  trip_id: string;
  day: number;
  title: string;
  description: string | null;
  start_time: Date | null;
  end_time: Date | null;
  destination_id: string | null;
}

// Строка таблицы notes.
export interface NoteRow {
  id: string;
  trip_id: string;
  content: string;
  created_at: Date;
}

// Строка таблицы reminders.
export interface ReminderRow {
  id: string;
  trip_id: string;
  message: string;
  remind_at: Date;
  created_at: Date;
}
