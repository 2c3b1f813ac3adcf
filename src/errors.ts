// Ошибки предметной области, общие для HTTP, MCP и CLI.

// Некорректные входные данные (пустой запрос, нарушение инварианта дат и т.п.).
export class ValidationError extends Error {
  name = 'ValidationError';

  constructor(message: string) {
    super(message);
  }
}

// Запись не найдена. Сообщение совпадает с текстом ответа API.
export class NotFoundError extends Error {
  name = 'NotFoundError';

  constructor(readonly entity: string) {
    super(`${entity} not found`);
  }
}
