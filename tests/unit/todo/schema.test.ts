/**
 * Tests for the todo wire schemas.
 * @module tests/unit/todo/schema
 */

import { describe, it, expect } from "vitest";
import {
  TODO_COLUMNS,
  TODO_FIELDS,
  createTodoSchema,
  decodeTodoRow,
  todoIdSchema,
  updateTodoSchema,
} from "../../../src/todo/index.js";

describe("todo schema", () => {
  describe("TODO_FIELDS", () => {
    it("should list the wire fields in order", () => {
      expect(TODO_FIELDS).toEqual([
        "id",
        "body",
        "completed",
        "created_at",
        "updated_at",
      ]);
      expect(TODO_COLUMNS).toBe("id, body, completed, created_at, updated_at");
    });
  });

  describe("decodeTodoRow()", () => {
    const row = {
      id: 3,
      body: "walk dog",
      completed: 1,
      created_at: "2024-05-01T10:00:00.000Z",
      updated_at: "2024-05-01T11:00:00.000Z",
    };

    it("should convert 0/1 to booleans", () => {
      expect(decodeTodoRow(row).completed).toBe(true);
      expect(decodeTodoRow({ ...row, completed: 0 }).completed).toBe(false);
    });

    it("should drop columns outside the wire shape", () => {
      expect(decodeTodoRow({ ...row, extra: "x" })).toEqual({
        ...row,
        completed: true,
      });
    });

    it("should reject rows with missing fields", () => {
      expect(() => decodeTodoRow({ id: 1 })).toThrow();
    });
  });

  describe("createTodoSchema", () => {
    it("should accept a body", () => {
      expect(createTodoSchema.parse({ body: "x" })).toEqual({ body: "x" });
    });

    it("should reject a missing or non-string body", () => {
      expect(createTodoSchema.safeParse({}).success).toBe(false);
      expect(createTodoSchema.safeParse({ body: 1 }).success).toBe(false);
    });
  });

  describe("updateTodoSchema", () => {
    it("should require both body and completed", () => {
      expect(updateTodoSchema.safeParse({ body: "x" }).success).toBe(false);
      expect(updateTodoSchema.safeParse({ completed: true }).success).toBe(
        false,
      );
      expect(
        updateTodoSchema.safeParse({ body: "x", completed: "yes" }).success,
      ).toBe(false);
    });

    it("should accept a full payload", () => {
      expect(updateTodoSchema.parse({ body: "x", completed: true })).toEqual({
        body: "x",
        completed: true,
      });
    });
  });

  describe("todoIdSchema", () => {
    it("should parse decimal integers", () => {
      expect(todoIdSchema.parse("1")).toBe(1);
      expect(todoIdSchema.parse("250")).toBe(250);
    });

    it("should accept zero, negatives, signs and leading zeros", () => {
      expect(todoIdSchema.parse("0")).toBe(0);
      expect(todoIdSchema.parse("-1")).toBe(-1);
      expect(todoIdSchema.parse("+7")).toBe(7);
      expect(todoIdSchema.parse("01")).toBe(1);
    });

    it("should keep ids past the safe integer range as bigint", () => {
      expect(todoIdSchema.parse("9007199254740993")).toBe(9007199254740993n);
      expect(todoIdSchema.parse("9223372036854775807")).toBe(
        9223372036854775807n,
      );
      expect(todoIdSchema.parse("-9223372036854775808")).toBe(
        -9223372036854775808n,
      );
    });

    it("should reject ids outside the signed 64-bit range", () => {
      const result = todoIdSchema.safeParse("9223372036854775808");

      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe(
        "id must fit in a signed 64-bit integer",
      );
      expect(todoIdSchema.safeParse("-9223372036854775809").success).toBe(
        false,
      );
    });

    it.each(["1.5", "abc", "", "1e3", " 1", "0x10", "-"])(
      "should reject %j",
      (value) => {
        expect(todoIdSchema.safeParse(value).success).toBe(false);
      },
    );
  });
});
