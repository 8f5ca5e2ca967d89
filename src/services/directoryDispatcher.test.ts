import { describe, expect, it } from "vitest";

import {
  buildContactFields,
  buildContactRecords,
} from "../test-utils/buildContactFixture";
import { MemoryContactRepository } from "../test-utils/memoryContactRepository";
import {
  EmptyFieldError,
  EmptyQueryError,
  IndexOutOfRangeError,
  InvalidPhoneFormatError,
} from "./contactErrors";
import { dispatch } from "./directoryDispatcher";

describe("dispatch", () => {
  describe("page", () => {
    it("returns the requested slice with totals", () => {
      const repository = new MemoryContactRepository(buildContactRecords(5));

      const response = dispatch(repository, {
        type: "page",
        pageNumber: 3,
        pageSize: 2,
      });

      expect(response).toEqual({
        type: "page",
        pageNumber: 3,
        pageSize: 2,
        total: 5,
        pageCount: 3,
        records: [repository.records[4]],
      });
    });

    it("returns an empty page for a non-positive page number", () => {
      const repository = new MemoryContactRepository(buildContactRecords(5));

      const response = dispatch(repository, {
        type: "page",
        pageNumber: 0,
        pageSize: 2,
      });

      expect(response.type === "page" && response.records).toEqual([]);
    });
  });

  describe("add", () => {
    it("validates and stores a new record", () => {
      const repository = new MemoryContactRepository(buildContactRecords(2));

      const response = dispatch(repository, {
        type: "add",
        input: { ...buildContactFields(), lastName: "  Новиков  " },
      });

      expect(response).toEqual({
        type: "added",
        record: { ...buildContactFields({ lastName: "Новиков" }), id: 3 },
      });
      expect(repository.records).toHaveLength(3);
    });

    it("returns a validation error without storing anything", () => {
      const repository = new MemoryContactRepository();

      const response = dispatch(repository, {
        type: "add",
        input: { ...buildContactFields(), workPhone: "84951112233" },
      });

      expect(response.type === "error" && response.error).toBeInstanceOf(
        InvalidPhoneFormatError,
      );
      expect(repository.records).toEqual([]);
    });

    it("rejects input with a blank field", () => {
      const response = dispatch(new MemoryContactRepository(), {
        type: "add",
        input: { ...buildContactFields(), organization: "" },
      });

      expect(response.type === "error" && response.error).toBeInstanceOf(
        EmptyFieldError,
      );
    });
  });

  describe("edit", () => {
    it("applies only the supplied fields", () => {
      const repository = new MemoryContactRepository(buildContactRecords(3));

      const response = dispatch(repository, {
        type: "edit",
        index: 2,
        input: { patronymic: " Петрович " },
      });

      expect(response).toEqual({
        type: "edited",
        record: { ...buildContactRecords(3)[1], patronymic: "Петрович" },
      });
    });

    it("reports an index outside the collection", () => {
      const repository = new MemoryContactRepository(buildContactRecords(3));

      const response = dispatch(repository, {
        type: "edit",
        index: 4,
        input: { patronymic: "Петрович" },
      });

      expect(response.type === "error" && response.error).toBeInstanceOf(
        IndexOutOfRangeError,
      );
      expect(repository.records).toEqual(buildContactRecords(3));
    });

    it("reports invalid overrides before touching the record", () => {
      const repository = new MemoryContactRepository(buildContactRecords(1));

      const response = dispatch(repository, {
        type: "edit",
        index: 1,
        input: { firstName: "Олег", personalPhone: "+7 (916) 44-55-66" },
      });

      expect(response.type === "error" && response.error).toBeInstanceOf(
        InvalidPhoneFormatError,
      );
      expect(repository.records[0].firstName).toBe("Иван");
    });
  });

  describe("search", () => {
    it("returns matching records", () => {
      const repository = new MemoryContactRepository(buildContactRecords(5));

      const response = dispatch(repository, {
        type: "search",
        term: "дмитриев",
      });

      expect(response).toEqual({
        type: "search",
        term: "дмитриев",
        records: [repository.records[4]],
      });
    });

    it("rejects a blank term", () => {
      const response = dispatch(new MemoryContactRepository(), {
        type: "search",
        term: "  ",
      });

      expect(response.type === "error" && response.error).toBeInstanceOf(
        EmptyQueryError,
      );
    });
  });
});
