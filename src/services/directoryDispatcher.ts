import { ContactInput, ContactRecord } from "../types/contact";
import { countPages, page } from "../utils/paginate";
import { DirectoryError } from "./contactErrors";
import { searchContacts } from "./contactSearch";
import { ContactRepository } from "./contactStore";
import {
  validateContactInput,
  validateContactOverrides,
} from "./contactValidator";

export type DirectoryCommand =
  | { type: "page"; pageNumber: number; pageSize: number }
  | { type: "add"; input: ContactInput }
  | { type: "edit"; index: number; input: ContactInput }
  | { type: "search"; term: string };

export type DirectoryResponse =
  | {
      type: "page";
      pageNumber: number;
      pageSize: number;
      total: number;
      pageCount: number;
      records: ContactRecord[];
    }
  | { type: "added"; record: ContactRecord }
  | { type: "edited"; record: ContactRecord }
  | { type: "search"; term: string; records: ContactRecord[] }
  | { type: "error"; error: DirectoryError };

/**
 * Runs one command against the repository. Recoverable failures come back
 * as an `error` response; persistence failures are thrown by the repository.
 */
export function dispatch(
  repository: ContactRepository,
  command: DirectoryCommand,
): DirectoryResponse {
  switch (command.type) {
    case "page": {
      const records = repository.list();
      return {
        type: "page",
        pageNumber: command.pageNumber,
        pageSize: command.pageSize,
        total: records.length,
        pageCount: countPages(records.length, command.pageSize),
        records: page(records, command.pageNumber, command.pageSize),
      };
    }

    case "add": {
      const validated = validateContactInput(command.input);
      if (!validated.ok) {
        return { type: "error", error: validated.error };
      }
      return { type: "added", record: repository.add(validated.value) };
    }

    case "edit": {
      const validated = validateContactOverrides(command.input);
      if (!validated.ok) {
        return { type: "error", error: validated.error };
      }

      const edited = repository.edit(command.index, validated.value);
      if (!edited.ok) {
        return { type: "error", error: edited.error };
      }
      return { type: "edited", record: edited.value };
    }

    case "search": {
      const found = searchContacts(repository.list(), command.term);
      if (!found.ok) {
        return { type: "error", error: found.error };
      }
      return { type: "search", term: command.term, records: found.value };
    }
  }
}
