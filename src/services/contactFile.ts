import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import {
  CONTACT_FIELDS,
  ContactRecord,
  PHONEBOOK_HEADER,
} from "../types/contact";
import { logError } from "../utils/log";
import { ParseError, PersistenceError } from "./contactErrors";

type ParsedRow = {
  record: string[];
  info: { lines: number };
};

function isParsedRow(value: unknown): value is ParsedRow {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  const info = row.info as Record<string, unknown> | undefined;
  return (
    Array.isArray(row.record) &&
    row.record.every((cell) => typeof cell === "string") &&
    !!info &&
    typeof info.lines === "number"
  );
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// The write error is the one reported to the caller; a failed cleanup is
// only logged.
function removeTempFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch (error) {
    logError("phonebook_temp_cleanup_failed", error, { file: tempPath });
  }
}

function parseRows(raw: string): ParsedRow[] {
  let parsed: unknown;
  try {
    parsed = parse(raw, {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new ParseError(
      `Phonebook file is not valid CSV: ${errorMessage(error)}`,
    );
  }

  if (!Array.isArray(parsed) || !parsed.every((row) => isParsedRow(row))) {
    throw new ParseError("Phonebook file has an unexpected shape.");
  }

  return parsed;
}

function assertHeader(row: ParsedRow): void {
  const matches =
    row.record.length === PHONEBOOK_HEADER.length &&
    row.record.every((label, index) => label === PHONEBOOK_HEADER[index]);

  if (!matches) {
    throw new ParseError(
      `expected header "${PHONEBOOK_HEADER.join(",")}", got "${row.record.join(",")}"`,
      row.info.lines,
    );
  }
}

function toContactRecord(row: ParsedRow): ContactRecord {
  const { record: cells, info } = row;

  if (cells.length !== PHONEBOOK_HEADER.length) {
    throw new ParseError(
      `expected ${PHONEBOOK_HEADER.length} columns, got ${cells.length}`,
      info.lines,
    );
  }

  const [
    rawId,
    lastName,
    firstName,
    patronymic,
    organization,
    workPhone,
    personalPhone,
  ] = cells;
  if (!/^\d+$/.test(rawId) || Number(rawId) < 1) {
    throw new ParseError(`"${rawId}" is not a valid record id`, info.lines);
  }

  return {
    id: Number(rawId),
    lastName,
    firstName,
    patronymic,
    organization,
    workPhone,
    personalPhone,
  };
}

function toRow(record: ContactRecord): string[] {
  return [String(record.id), ...CONTACT_FIELDS.map((field) => record[field])];
}

/**
 * Reads the phonebook at `filePath`. A missing or empty file is an empty
 * phonebook. Ids are taken from the file as-is; the next save renumbers them.
 */
export function loadContacts(filePath: string): ContactRecord[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw new PersistenceError(
      `Unable to read phonebook: ${errorMessage(error)}`,
    );
  }

  const rows = parseRows(raw);
  if (rows.length === 0) {
    return [];
  }

  assertHeader(rows[0]);
  return rows.slice(1).map((row) => toContactRecord(row));
}

/**
 * Rewrites the whole phonebook. Every record's `id` is set to its 1-based
 * position first, on the objects passed in. The file is written next to the
 * target and renamed over it, so a failed save leaves the old file intact.
 */
export function saveContacts(
  filePath: string,
  records: ContactRecord[],
): void {
  records.forEach((record, index) => {
    record.id = index + 1;
  });

  const content: string = stringify(
    [PHONEBOOK_HEADER, ...records.map(toRow)],
    { record_delimiter: "windows", quoted_match: /[\r\n]/ },
  );
  const tempPath = `${filePath}.tmp`;

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const fd = fs.openSync(tempPath, "w");
    try {
      fs.writeFileSync(fd, content, "utf8");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    fs.renameSync(tempPath, filePath);
  } catch (error) {
    removeTempFile(tempPath);
    throw new PersistenceError(
      `Unable to write phonebook: ${errorMessage(error)}`,
    );
  }
}
