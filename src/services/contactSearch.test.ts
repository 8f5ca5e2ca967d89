import { describe, expect, it } from "vitest";

import { buildContactRecords } from "../test-utils/buildContactFixture";
import { EmptyQueryError } from "./contactErrors";
import { searchContacts } from "./contactSearch";

describe("searchContacts", () => {
  it("matches the organization case-insensitively", () => {
    const records = buildContactRecords(3);
    records[1].organization = "Ivanov LLC";

    const result = searchContacts(records, "ivanov");

    expect(result).toEqual({ ok: true, value: [records[1]] });
  });

  it("matches Cyrillic text regardless of case", () => {
    const records = buildContactRecords(3);

    const result = searchContacts(records, "БОРИСОВ");

    expect(result.ok && result.value.map((record) => record.id)).toEqual([2]);
  });

  it("returns every matching record in collection order", () => {
    const records = buildContactRecords(5);

    const result = searchContacts(records, "000-00-1");

    expect(result.ok && result.value.map((record) => record.id)).toEqual([
      1, 2, 3, 4, 5,
    ]);
  });

  it("matches on the id column", () => {
    const records = buildContactRecords(3);
    records.forEach((record) => {
      record.workPhone = "+7 (495) 555-55-55";
      record.personalPhone = "+7 (916) 555-55-55";
    });

    const result = searchContacts(records, "3");

    expect(result.ok && result.value.map((record) => record.id)).toEqual([3]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(searchContacts(buildContactRecords(3), "zzz")).toEqual({
      ok: true,
      value: [],
    });
  });

  it("uses the term as typed, including surrounding spaces", () => {
    const records = buildContactRecords(2);
    records[0].organization = "ООО Вектор Плюс";

    const result = searchContacts(records, "вектор ");

    expect(result.ok && result.value.map((record) => record.id)).toEqual([1]);
  });

  it.each(["", "   ", "\t"])("rejects the blank term %j", (term) => {
    const result = searchContacts(buildContactRecords(2), term);

    expect(!result.ok && result.error).toBeInstanceOf(EmptyQueryError);
  });
});
