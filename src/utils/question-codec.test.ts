import { describe, it, expect } from "vitest";
import { Types } from "mongoose";
import { decodeQuestion, toQuestionRecord } from "./question-codec";
import { parseStringParam } from "./query-parser";

describe("decodeQuestion", () => {
  it("keeps content fields and the visibility flag", () => {
    expect(
      decodeQuestion('{"pvt": true, "statement": "2+2=?", "options": ["3", "4"]}')
    ).toEqual({ pvt: true, statement: "2+2=?", options: ["3", "4"] });
  });

  it("treats a missing or null pvt as public", () => {
    expect(decodeQuestion('{"statement": "x"}')).toEqual({
      pvt: false,
      statement: "x",
    });
    expect(decodeQuestion('{"pvt": null}')).toEqual({ pvt: false });
  });

  it("drops identity fields sent by the client", () => {
    expect(
      decodeQuestion('{"id": "abc", "_id": "def", "pvt": false, "statement": "x"}')
    ).toEqual({ pvt: false, statement: "x" });
  });

  it("rejects bodies that are not JSON objects", () => {
    expect(decodeQuestion("")).toBeNull();
    expect(decodeQuestion("{")).toBeNull();
    expect(decodeQuestion("[1, 2]")).toBeNull();
    expect(decodeQuestion('"statement"')).toBeNull();
    expect(decodeQuestion("42")).toBeNull();
    expect(decodeQuestion("null")).toBeNull();
  });

  it("rejects a non-boolean pvt", () => {
    expect(decodeQuestion('{"pvt": "yes"}')).toBeNull();
    expect(decodeQuestion('{"pvt": 1}')).toBeNull();
  });

  it("rejects dotted and $-prefixed keys at any depth", () => {
    expect(decodeQuestion('{"pvt": false, "a.b": 1, "statement": "x"}')).toBeNull();
    expect(decodeQuestion('{"$set": {"pvt": true}}')).toBeNull();
    expect(decodeQuestion('{"options": {"x.y": "3"}}')).toBeNull();
    expect(decodeQuestion('{"options": [{"$gt": 1}]}')).toBeNull();
  });

  it("accepts dots and dollars inside values", () => {
    expect(decodeQuestion('{"statement": "costs $3.50"}')).toEqual({
      pvt: false,
      statement: "costs $3.50",
    });
  });
});

describe("toQuestionRecord", () => {
  it("renames _id to a string id", () => {
    const _id = new Types.ObjectId("64b7f0c2a1b2c3d4e5f60718");
    const record = toQuestionRecord({ _id, pvt: false, statement: "x" });

    expect(record).toEqual({
      id: "64b7f0c2a1b2c3d4e5f60718",
      pvt: false,
      statement: "x",
    });
    expect(record).not.toHaveProperty("_id");
  });
});

describe("parseStringParam", () => {
  it("reads plain strings, including empty ones", () => {
    expect(parseStringParam("abc")).toBe("abc");
    expect(parseStringParam("")).toBe("");
  });

  it("takes the first of repeated parameters", () => {
    expect(parseStringParam(["a", "b"])).toBe("a");
  });

  it("treats missing and nested values as absent", () => {
    expect(parseStringParam(undefined)).toBeUndefined();
    expect(parseStringParam({ nested: "x" })).toBeUndefined();
    expect(parseStringParam([{ nested: "x" }])).toBeUndefined();
  });
});
