/**
 * Optional-field accessors for declared attributes and live records.
 *
 * A missing field reads as `undefined`. A field that is present with an
 * unexpected type also reads as `undefined` and is recorded as a ShapeIssue.
 * Nothing here substitutes defaults: absent is never zero or empty.
 */

import type { ShapeIssue } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ReaderOrigin {
  resourceType: string;
  resourceId: string;
  side: "declared" | "live";
}

export class FieldReader {
  constructor(
    private readonly source: Readonly<Record<string, unknown>>,
    private readonly origin: ReaderOrigin,
    private readonly issues: ShapeIssue[],
    private readonly prefix = "",
  ) {}

  has(key: string): boolean {
    return this.source[key] !== undefined && this.source[key] !== null;
  }

  raw(key: string): unknown {
    return this.source[key];
  }

  string(key: string): string | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === "string") return value;
    this.report(key, `expected string, got ${describeType(value)}`);
    return undefined;
  }

  /** Numbers and numeric strings (`"100"`) both read as numbers. */
  number(key: string): number | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
    this.report(key, `expected number, got ${describeType(value)}`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === "boolean") return value;
    this.report(key, `expected boolean, got ${describeType(value)}`);
    return undefined;
  }

  record(key: string): FieldReader | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (isRecord(value)) return new FieldReader(value, this.origin, this.issues, this.path(key));
    this.report(key, `expected object, got ${describeType(value)}`);
    return undefined;
  }

  list(key: string): unknown[] | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (Array.isArray(value)) return value;
    this.report(key, `expected list, got ${describeType(value)}`);
    return undefined;
  }

  /** Object entries of a list; other entries are reported and dropped. */
  records(key: string): FieldReader[] {
    const items = this.list(key);
    if (!items) return [];
    const readers: FieldReader[] = [];
    items.forEach((item, index) => {
      if (isRecord(item)) {
        readers.push(new FieldReader(item, this.origin, this.issues, `${this.path(key)}[${index}]`));
      } else {
        this.report(`${key}[${index}]`, `expected object, got ${describeType(item)}`);
      }
    });
    return readers;
  }

  /**
   * First element of a nested block list (`versioning = [{ enabled = true }]`)
   * or the value itself when the block is an object.
   */
  block(key: string): FieldReader | undefined {
    const value = this.source[key];
    if (isRecord(value)) return this.record(key);
    const [first] = this.records(key);
    return first;
  }

  stringList(key: string): string[] | undefined {
    const items = this.list(key);
    if (!items) return undefined;
    const strings: string[] = [];
    items.forEach((item, index) => {
      if (typeof item === "string") strings.push(item);
      else this.report(`${key}[${index}]`, `expected string, got ${describeType(item)}`);
    });
    return strings;
  }

  private path(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  private report(key: string, detail: string): void {
    this.issues.push({
      resourceType: this.origin.resourceType,
      resourceId: this.origin.resourceId,
      side: this.origin.side,
      field: this.path(key),
      detail,
    });
  }
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}
