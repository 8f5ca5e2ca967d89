import {
  CONTACT_FIELDS,
  ContactFields,
  ContactRecord,
} from "../types/contact";
import { logEvent } from "../utils/log";
import { err, ok, Result } from "../utils/result";
import { IndexOutOfRangeError } from "./contactErrors";
import { loadContacts, saveContacts } from "./contactFile";

export interface ContactRepository {
  list(): readonly ContactRecord[];
  add(fields: ContactFields): ContactRecord;
  edit(
    index: number,
    overrides: Partial<ContactFields>,
  ): Result<ContactRecord, IndexOutOfRangeError>;
}

export function findContact(
  records: readonly ContactRecord[],
  index: number,
): Result<ContactRecord, IndexOutOfRangeError> {
  if (!Number.isInteger(index) || index < 1 || index > records.length) {
    return err(new IndexOutOfRangeError(index, records.length));
  }

  return ok(records[index - 1]);
}

export function addContact(
  filePath: string,
  records: ContactRecord[],
  fields: ContactFields,
): ContactRecord {
  const record: ContactRecord = {
    id: records.length + 1,
    lastName: fields.lastName,
    firstName: fields.firstName,
    patronymic: fields.patronymic,
    organization: fields.organization,
    workPhone: fields.workPhone,
    personalPhone: fields.personalPhone,
  };

  records.push(record);
  try {
    saveContacts(filePath, records);
  } catch (error) {
    records.pop();
    throw error;
  }

  return record;
}

/**
 * Replaces the supplied fields of the record at `index` (1-based) and saves.
 * The record keeps its position, so its id does not change.
 */
export function editContact(
  filePath: string,
  records: ContactRecord[],
  index: number,
  overrides: Partial<ContactFields>,
): Result<ContactRecord, IndexOutOfRangeError> {
  const found = findContact(records, index);
  if (!found.ok) {
    return found;
  }

  const record = found.value;
  const previous: ContactFields = { ...record };
  for (const field of CONTACT_FIELDS) {
    const value = overrides[field];
    if (value !== undefined) {
      record[field] = value;
    }
  }

  try {
    saveContacts(filePath, records);
  } catch (error) {
    // A failed save must not leave unsaved changes in memory.
    for (const field of CONTACT_FIELDS) {
      record[field] = previous[field];
    }
    throw error;
  }
  return ok(record);
}

export class ContactStore implements ContactRepository {
  private records: ContactRecord[] = [];

  constructor(private readonly filePath: string) {}

  get size(): number {
    return this.records.length;
  }

  list(): readonly ContactRecord[] {
    return this.records;
  }

  load(): readonly ContactRecord[] {
    this.records = loadContacts(this.filePath);
    logEvent("phonebook_loaded", {
      file: this.filePath,
      records: this.records.length,
    });
    return this.records;
  }

  save(): void {
    saveContacts(this.filePath, this.records);
    this.logSaved();
  }

  add(fields: ContactFields): ContactRecord {
    const record = addContact(this.filePath, this.records, fields);
    this.logSaved();
    return record;
  }

  edit(
    index: number,
    overrides: Partial<ContactFields>,
  ): Result<ContactRecord, IndexOutOfRangeError> {
    const result = editContact(this.filePath, this.records, index, overrides);
    if (result.ok) {
      this.logSaved();
    }
    return result;
  }

  private logSaved(): void {
    logEvent("phonebook_saved", {
      file: this.filePath,
      records: this.records.length,
    });
  }
}
