import { CONTACT_FIELDS, ContactRecord } from "../types/contact";
import { err, ok, Result } from "../utils/result";
import { EmptyQueryError } from "./contactErrors";

function fieldValues(record: ContactRecord): string[] {
  return [String(record.id), ...CONTACT_FIELDS.map((field) => record[field])];
}

/**
 * Case-insensitive substring match against every field, id included. The
 * term is used as typed; it is only trimmed to decide whether it is blank.
 */
export function searchContacts(
  records: readonly ContactRecord[],
  term: string,
): Result<ContactRecord[], EmptyQueryError> {
  if (!term.trim()) {
    return err(new EmptyQueryError());
  }

  const needle = term.toLowerCase();
  return ok(
    records.filter((record) =>
      fieldValues(record).some((value) =>
        value.toLowerCase().includes(needle),
      ),
    ),
  );
}
