import { describe, it, expect } from "vitest";
import {
  cleanSql,
  cteNames,
  disallowedRelations,
  ensureLimit,
  isSafeSelect,
  referencedRelations,
} from "../src/guards/sqlGuard";

describe("sqlGuard", () => {
  it("accepts simple SELECT", () => {
    expect(isSafeSelect("SELECT 1")).toBe(true);
  });
  it("rejects writes and DDL", () => {
    expect(isSafeSelect("DELETE FROM x")).toBe(false);
    expect(isSafeSelect("CREATE TABLE x()")).toBe(false);
    expect(isSafeSelect("WITH d AS (DELETE FROM x RETURNING *) SELECT * FROM d")).toBe(false);
  });
  it("rejects semicolons", () => {
    expect(isSafeSelect("SELECT 1; SELECT 2")).toBe(false);
  });
  it("rejects system schemas", () => {
    expect(isSafeSelect("SELECT * FROM pg_catalog.pg_tables")).toBe(false);
  });
  it("ignores keywords inside string literals", () => {
    expect(isSafeSelect("SELECT * FROM t WHERE note = 'update later'")).toBe(true);
  });
  it("ensures limit when missing", () => {
    expect(ensureLimit("SELECT * FROM a", 100)).toBe("SELECT * FROM a LIMIT 100");
  });
  it("does not change when limit present", () => {
    expect(ensureLimit("SELECT * FROM a LIMIT 5", 100)).toBe("SELECT * FROM a LIMIT 5");
  });
});

describe("cleanSql", () => {
  it("strips code fences and the trailing semicolon", () => {
    expect(cleanSql("```sql\nSELECT 1;\n```")).toBe("SELECT 1");
  });
  it("drops a SQLQuery label", () => {
    expect(cleanSql("SQLQuery: SELECT 2")).toBe("SELECT 2");
  });
});

describe("relation allow-list", () => {
  it("collects FROM and JOIN targets without schema prefix", () => {
    const sql =
      'SELECT destination_country, COUNT(*) FROM public.global_student_migration m JOIN "Visas" v ON v.id = m.id GROUP BY 1';
    expect(referencedRelations(sql)).toEqual(["global_student_migration", "Visas"]);
  });
  it("does not mistake EXTRACT or IS DISTINCT FROM operands for relations", () => {
    const sql =
      "SELECT EXTRACT(YEAR FROM enrolled_on) AS y FROM global_student_migration WHERE a IS DISTINCT FROM b";
    expect(referencedRelations(sql)).toEqual(["global_student_migration"]);
  });
  it("handles nested calls inside EXTRACT", () => {
    const sql =
      "SELECT EXTRACT(YEAR FROM DATE(enrolled_on)) AS y, COUNT(*) FROM global_student_migration GROUP BY 1";
    expect(disallowedRelations(sql, ["global_student_migration"])).toEqual([]);
  });
  it("skips set-returning function calls after FROM", () => {
    const sql = "SELECT * FROM generate_series(1, 3) g JOIN public.global_student_migration m ON m.id = g";
    expect(referencedRelations(sql)).toEqual(["global_student_migration"]);
  });
  it("treats CTE names as allowed", () => {
    const sql = "WITH top AS (SELECT * FROM global_student_migration) SELECT * FROM top";
    expect(cteNames(sql)).toEqual(["top"]);
    expect(disallowedRelations(sql, ["global_student_migration"])).toEqual([]);
  });
  it("reports tables outside the allow-list", () => {
    expect(disallowedRelations("SELECT * FROM users", ["global_student_migration"])).toEqual(["users"]);
  });
});
