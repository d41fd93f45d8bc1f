import { parse } from "@iarna/toml";

export type TomlValue =
  | boolean
  | number
  | string
  | Date
  | TomlValue[]
  | TomlTable;

export interface TomlTable {
  [key: string]: TomlValue;
}

export function parseTomlDocument(content: string): TomlTable {
  const result: unknown = parse(content);
  if (!isTomlTable(result)) {
    throw new Error("Expected TOML document to be a table.");
  }
  return result;
}

export function isTomlTable(value: unknown): value is TomlTable {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

export function isTomlTableArray(value: unknown): value is TomlTable[] {
  return Array.isArray(value) && value.every(isTomlTable);
}
