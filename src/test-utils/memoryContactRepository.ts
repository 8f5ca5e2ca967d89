import { ContactFields, ContactRecord } from "../types/contact";
import { ok, Result } from "../utils/result";
import { IndexOutOfRangeError } from "../services/contactErrors";
import { ContactRepository, findContact } from "../services/contactStore";

/** In-process stand-in for ContactStore that never touches the disk. */
export class MemoryContactRepository implements ContactRepository {
  constructor(readonly records: ContactRecord[] = []) {}

  list(): readonly ContactRecord[] {
    return this.records;
  }

  add(fields: ContactFields): ContactRecord {
    const record = { ...fields, id: this.records.length + 1 };
    this.records.push(record);
    return record;
  }

  edit(
    index: number,
    overrides: Partial<ContactFields>,
  ): Result<ContactRecord, IndexOutOfRangeError> {
    const found = findContact(this.records, index);
    if (!found.ok) {
      return found;
    }
    Object.assign(found.value, overrides);
    return ok(found.value);
  }
}
