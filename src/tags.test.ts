import { describe, expect, it } from "vitest";
import { compareTags, toTagMap } from "./tags.js";

const NO_IGNORE = new Set<string>();

describe("toTagMap", () => {
  it("converts Key/Value lists into a map", () => {
    expect(toTagMap([{ Key: "Name", Value: "web" }, { Key: "Env", Value: "prod" }])).toEqual({ Name: "web", Env: "prod" });
  });

  it("copies plain maps and treats absent tags as empty", () => {
    expect(toTagMap({ Name: "web" })).toEqual({ Name: "web" });
    expect(toTagMap(undefined)).toEqual({});
    expect(toTagMap(null)).toEqual({});
  });

  it("rejects shapes that are neither", () => {
    expect(toTagMap("Name=web")).toBeUndefined();
    expect(toTagMap([{ Value: "orphan" }])).toBeUndefined();
  });
});

describe("compareTags", () => {
  it("returns null for equal tag sets", () => {
    expect(compareTags({ Name: "web", Env: "prod" }, { Env: "prod", Name: "web" }, NO_IGNORE)).toBeNull();
  });

  it("reports missing, extra and changed keys", () => {
    const diff = compareTags(
      { Name: "web", Env: "prod", BackupRetention: "30-days" },
      { Name: "web", Env: "staging", Team: "core" },
      NO_IGNORE,
    );

    expect(diff).toEqual({
      kind: "tags",
      declared: { Name: "web", Env: "prod", BackupRetention: "30-days" },
      live: { Name: "web", Env: "staging", Team: "core" },
      missingInLive: { BackupRetention: "30-days" },
      extraInLive: { Team: "core" },
      changed: { Env: { declared: "prod", live: "staging" } },
    });
  });

  it("drops ignored keys from both sides before comparing", () => {
    const ignore = new Set(["LastModified", "CreatedBy"]);
    expect(
      compareTags(
        { Name: "web", LastModified: "2024-01-01" },
        { Name: "web", LastModified: "2024-06-30", CreatedBy: "console" },
        ignore,
      ),
    ).toBeNull();

    const diff = compareTags({ Name: "web", CreatedBy: "ci" }, { Name: "api", CreatedBy: "console" }, ignore);
    expect(diff?.declared).toEqual({ Name: "web" });
    expect(diff?.live).toEqual({ Name: "api" });
  });

  it("does not coerce value types", () => {
    const diff = compareTags({ Port: "1" }, { Port: 1 }, NO_IGNORE);
    expect(diff?.changed).toEqual({ Port: { declared: "1", live: 1 } });
  });
});
