export class EmptyFieldError extends Error {
  constructor(readonly fieldName: string) {
    super(`${fieldName} не может быть пустым.`);
    this.name = "EmptyFieldError";
  }
}

export class InvalidPhoneFormatError extends Error {
  constructor(
    readonly fieldName: string,
    readonly value: string,
  ) {
    super(
      `${fieldName}: некорректный формат телефона. Используйте формат +7 (XXX) XXX-XX-XX.`,
    );
    this.name = "InvalidPhoneFormatError";
  }
}

export class IndexOutOfRangeError extends Error {
  constructor(
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? `Некорректный индекс записи ${index}: справочник пуст.`
        : `Некорректный индекс записи ${index}: выберите запись от 1 до ${size}.`,
    );
    this.name = "IndexOutOfRangeError";
  }
}

export class EmptyQueryError extends Error {
  constructor() {
    super("Введите корректный текст для поиска.");
    this.name = "EmptyQueryError";
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = "ParseError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export type ContactValidationError = EmptyFieldError | InvalidPhoneFormatError;

export type DirectoryError =
  | ContactValidationError
  | IndexOutOfRangeError
  | EmptyQueryError;
