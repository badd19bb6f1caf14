import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { splitStatements } from "../migrate";

const MIGRATIONS = path.join(__dirname, "../../database/migrations");

describe("splitStatements", () => {
  it("splits on semicolons and drops comment lines", () => {
    const sql = [
      "-- Clinics; one row per site",
      "CREATE TABLE clinics (id CHAR(36));",
      "",
      "-- Doctors",
      "CREATE TABLE doctors (",
      "  id CHAR(36)",
      ");",
      "",
    ].join("\n");

    expect(splitStatements(sql)).toEqual(["CREATE TABLE clinics (id CHAR(36))", "CREATE TABLE doctors (\n  id CHAR(36)\n)"]);
  });

  it("returns nothing for a file of comments", () => {
    expect(splitStatements("-- nothing to do;\n\n")).toEqual([]);
  });

  it("reads the shipped schema as whole statements", async () => {
    const up = splitStatements(await fs.readFile(path.join(MIGRATIONS, "001_initial_schema.sql"), "utf-8"));
    const down = splitStatements(await fs.readFile(path.join(MIGRATIONS, "001_initial_schema.rollback.sql"), "utf-8"));

    expect(up).toHaveLength(5);
    expect(up.every((statement) => statement.startsWith("CREATE TABLE"))).toBe(true);
    expect(down).toEqual([
      "DROP TABLE IF EXISTS appointments",
      "DROP TABLE IF EXISTS doctor_availability",
      "DROP TABLE IF EXISTS doctors",
      "DROP TABLE IF EXISTS clinic_working_hours",
      "DROP TABLE IF EXISTS clinics",
    ]);
  });
});
