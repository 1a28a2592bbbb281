/**
 * Tests for the error taxonomy.
 * @module tests/unit/core/errors
 */

import { describe, it, expect } from "vitest";
import {
  TodoError,
  TransportError,
  createErrorFromNetworkFailure,
  statusForError,
  statusForErrorCode,
  toStoreFailure,
} from "../../../src/errors.js";

describe("errors", () => {
  describe("TodoError", () => {
    it("should carry message, code and name", () => {
      const error = new TodoError("Todo 1 not found", "NOT_FOUND");

      expect(error.message).toBe("Todo 1 not found");
      expect(error.code).toBe("NOT_FOUND");
      expect(error.name).toBe("TodoError");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TodoError);
    });

    it("should preserve the cause", () => {
      const cause = new Error("disk I/O error");
      const error = new TodoError("Failed", "STORE_FAILURE", { cause });

      expect(error.cause).toBe(cause);
    });

    it("should expose code helpers", () => {
      expect(new TodoError("x", "NOT_FOUND").isNotFound).toBe(true);
      expect(new TodoError("x", "REQUEST_MALFORMED").isMalformed).toBe(true);
      expect(new TodoError("x", "STORE_FAILURE").isNotFound).toBe(false);
    });

    it("should recognise TodoErrors", () => {
      expect(TodoError.isTodoError(new TodoError("x", "NOT_FOUND"))).toBe(true);
      expect(TodoError.isTodoError(new Error("x"))).toBe(false);
      expect(TodoError.isTodoError("x")).toBe(false);
    });
  });

  describe("statusForErrorCode()", () => {
    it("should map every code", () => {
      expect(statusForErrorCode("NOT_FOUND")).toBe(404);
      expect(statusForErrorCode("REQUEST_MALFORMED")).toBe(400);
      expect(statusForErrorCode("STORE_FAILURE")).toBe(500);
    });
  });

  describe("statusForError()", () => {
    it("should use the code of a TodoError", () => {
      expect(statusForError(new TodoError("x", "NOT_FOUND"))).toBe(404);
    });

    it("should treat anything else as 500", () => {
      expect(statusForError(new Error("boom"))).toBe(500);
      expect(statusForError(undefined)).toBe(500);
    });
  });

  describe("toStoreFailure()", () => {
    it("should wrap plain errors", () => {
      const cause = new Error("database is locked");
      const error = toStoreFailure(cause, "create todo");

      expect(error.code).toBe("STORE_FAILURE");
      expect(error.message).toBe("Failed to create todo: database is locked");
      expect(error.cause).toBe(cause);
    });

    it("should pass TodoErrors through", () => {
      const original = new TodoError("Todo 1 not found", "NOT_FOUND");

      expect(toStoreFailure(original, "read todo")).toBe(original);
    });
  });

  describe("createErrorFromNetworkFailure()", () => {
    it("should report the socket error behind fetch failed", () => {
      const socketError = new Error("connect ECONNREFUSED 127.0.0.1:1");
      const fetchError = new TypeError("fetch failed", { cause: socketError });

      const error = createErrorFromNetworkFailure(
        fetchError,
        "http://127.0.0.1:1/v1/todos",
      );

      expect(error).toBeInstanceOf(TransportError);
      expect(error.code).toBe("CONNECTION_FAILED");
      expect(error.message).toBe(
        "Cannot connect to http://127.0.0.1:1/v1/todos: connect ECONNREFUSED 127.0.0.1:1",
      );
      expect(error.cause).toBe(fetchError);
    });

    it("should fall back to the error's own message", () => {
      const error = createErrorFromNetworkFailure(
        new Error("socket hang up"),
        "http://x/v1/todos",
      );

      expect(error.message).toBe(
        "Cannot connect to http://x/v1/todos: socket hang up",
      );
    });
  });
});
