import readline from "readline";

import {
  CONTACT_FIELD_LABELS,
  ContactField,
  ContactInput,
  ContactRecord,
  PHONE_FIELDS,
  TEXT_FIELDS,
} from "../types/contact";
import { ContactRepository, findContact } from "./contactStore";
import { validatePhone, validateString } from "./contactValidator";
import { dispatch, DirectoryResponse } from "./directoryDispatcher";

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

const MENU = [
  "",
  "Меню:",
  "1. Вывод постранично записей из справочника",
  "2. Добавление новой записи в справочник",
  "3. Возможность редактирования записей в справочнике",
  "4. Поиск записей по одной или нескольким характеристикам",
  "0. Выход",
].join("\n");

const FIELD_PROMPTS: Record<ContactField, string> = {
  lastName: "Введите фамилию",
  firstName: "Введите имя",
  patronymic: "Введите отчество",
  organization: "Введите название организации",
  workPhone: "Введите рабочий телефон в формате +7 (XXX) XXX-XX-XX",
  personalPhone:
    "Введите личный телефон (мобильный) в формате +7 (XXX) XXX-XX-XX",
};

const PHONE_FORMAT_HINT =
  "Некорректный формат телефона. Пожалуйста, введите в формате +7 (XXX) XXX-XX-XX";

export function formatContact(record: ContactRecord): string {
  return [
    `${record.id}. ${record.lastName} ${record.firstName} ${record.patronymic}`,
    record.organization,
    `раб.: ${record.workPhone}`,
    `личн.: ${record.personalPhone}`,
  ].join(" | ");
}

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

export type ConsoleOptions = {
  store: ContactRepository;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  pageSize: number;
};

class EndOfInput extends Error {}

function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

export async function runConsole(options: ConsoleOptions): Promise<void> {
  const { store, input, output, pageSize } = options;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  const print = (text: string): void => {
    output.write(`${text}\n`);
  };

  const ask = async (prompt: string): Promise<string> => {
    output.write(`${prompt}: `);
    const next = await lines.next();
    if (next.done) {
      throw new EndOfInput();
    }
    return next.value;
  };

  const askInteger = async (prompt: string): Promise<number | null> => {
    const value = parseInteger(await ask(prompt));
    if (value === null) {
      print("Ошибка: введите целое число.");
    }
    return value;
  };

  const askPhone = async (
    field: ContactField,
    keepCurrent: boolean,
  ): Promise<string | undefined> => {
    for (;;) {
      const answer = await ask(FIELD_PROMPTS[field]);
      if (keepCurrent && !answer.trim()) {
        return undefined;
      }
      if (validatePhone(answer)) {
        return answer;
      }
      print(PHONE_FORMAT_HINT);
    }
  };

  // New records need every field; on edit an empty answer keeps the value.
  const collectInput = async (
    keepCurrent: boolean,
  ): Promise<ContactInput | null> => {
    const collected: ContactInput = {};

    for (const field of TEXT_FIELDS) {
      const answer = await ask(FIELD_PROMPTS[field]);
      if (keepCurrent && !answer.trim()) {
        continue;
      }

      const result = validateString(answer, CONTACT_FIELD_LABELS[field]);
      if (!result.ok) {
        print(`Ошибка: ${result.error.message}`);
        return null;
      }
      collected[field] = result.value;
    }

    for (const field of PHONE_FIELDS) {
      const phone = await askPhone(field, keepCurrent);
      if (phone !== undefined) {
        collected[field] = phone;
      }
    }

    return collected;
  };

  const render = (response: DirectoryResponse): void => {
    switch (response.type) {
      case "page":
        if (response.records.length === 0) {
          print("На этой странице нет записей.");
        } else {
          response.records.forEach((record) => print(formatContact(record)));
        }
        print(
          `Страница ${response.pageNumber} из ${response.pageCount}, всего записей: ${response.total}.`,
        );
        return;
      case "added":
        print("Запись добавлена успешно.");
        print(formatContact(response.record));
        return;
      case "edited":
        print("Запись отредактирована успешно.");
        print(formatContact(response.record));
        return;
      case "search":
        if (response.records.length === 0) {
          print("Ничего не найдено.");
          return;
        }
        print("Результаты поиска:");
        response.records.forEach((record) => print(formatContact(record)));
        return;
      case "error":
        print(`Ошибка: ${response.error.message}`);
        return;
    }
  };

  const showPage = async (): Promise<void> => {
    const pageNumber = await askInteger("Введите номер страницы");
    if (pageNumber === null) {
      return;
    }

    const answer = await ask(
      `Введите количество записей на странице [${pageSize}]`,
    );
    const size = answer.trim() ? parseInteger(answer) : pageSize;
    if (size === null) {
      print("Ошибка: введите целое число.");
      return;
    }

    render(dispatch(store, { type: "page", pageNumber, pageSize: size }));
  };

  const addEntry = async (): Promise<void> => {
    const collected = await collectInput(false);
    if (collected) {
      render(dispatch(store, { type: "add", input: collected }));
    }
  };

  const editEntry = async (): Promise<void> => {
    const index = await askInteger("Введите индекс записи для редактирования");
    if (index === null) {
      return;
    }

    const found = findContact(store.list(), index);
    if (!found.ok) {
      print(`Ошибка: ${found.error.message}`);
      return;
    }

    print("Текущая запись:");
    print(formatContact(found.value));
    print("Оставьте поле пустым, чтобы сохранить текущее значение.");

    const collected = await collectInput(true);
    if (collected) {
      render(dispatch(store, { type: "edit", index, input: collected }));
    }
  };

  const searchEntries = async (): Promise<void> => {
    for (;;) {
      const term = await ask("Введите текст для поиска");
      const response = dispatch(store, { type: "search", term });
      render(response);
      if (response.type !== "error") {
        return;
      }
    }
  };

  const actions: Record<string, () => Promise<void>> = {
    "1": showPage,
    "2": addEntry,
    "3": editEntry,
    "4": searchEntries,
  };

  try {
    for (;;) {
      print(MENU);
      const choice = (await ask("Выберите действие")).trim();
      if (choice === "0") {
        return;
      }

      const action = actions[choice];
      if (action) {
        await action();
      } else {
        print("Некорректный выбор. Пожалуйста, выберите снова.");
      }
    }
  } catch (error) {
    if (!(error instanceof EndOfInput)) {
      throw error;
    }
  } finally {
    rl.close();
  }
}
