import path from "path";

import { describe, expect, it } from "vitest";

import { DEFAULT_PAGE_SIZE, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to phonebook.csv in the working directory", () => {
    expect(loadConfig({}, "/srv/phonebook")).toEqual({
      filePath: path.resolve("/srv/phonebook", "phonebook.csv"),
      pageSize: DEFAULT_PAGE_SIZE,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig(
        { PHONEBOOK_FILE: "data/contacts.csv", PHONEBOOK_PAGE_SIZE: "20" },
        "/srv/phonebook",
      ),
    ).toEqual({
      filePath: path.resolve("/srv/phonebook", "data/contacts.csv"),
      pageSize: 20,
    });
  });

  it("keeps absolute file paths", () => {
    expect(
      loadConfig({ PHONEBOOK_FILE: "/var/lib/phonebook.csv" }, "/srv").filePath,
    ).toBe(path.resolve("/var/lib/phonebook.csv"));
  });

  it.each(["0", "-3", "2.5", "many"])(
    "ignores the page size %j",
    (value) => {
      expect(loadConfig({ PHONEBOOK_PAGE_SIZE: value }, "/srv").pageSize).toBe(
        DEFAULT_PAGE_SIZE,
      );
    },
  );
});
