import { describe, expect, it } from "vitest";
import { MalformedPersonaResponseError } from "../src/core/errors.js";
import { parsePersonaResponse, stripCodeFence } from "../src/core/persona-schema.js";
import { samplePersona, samplePersonaJson } from "./helpers/fixtures.js";

function parseError(raw: string): MalformedPersonaResponseError {
  try {
    parsePersonaResponse(raw);
  } catch (error) {
    if (error instanceof MalformedPersonaResponseError) return error;
    throw error;
  }
  throw new Error("expected parsePersonaResponse to throw");
}

describe("stripCodeFence", () => {
  it("removes a json fence around the whole text", () => {
    expect(stripCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("removes a bare fence", () => {
    expect(stripCodeFence('  ```\n{"a": 1}\n```  ')).toBe('{"a": 1}');
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFence('{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("parsePersonaResponse", () => {
  it("accepts a complete persona", () => {
    expect(parsePersonaResponse(samplePersonaJson)).toEqual(samplePersona);
  });

  it("accepts a fenced persona and a numeric age", () => {
    const persona = parsePersonaResponse("```json\n" + JSON.stringify({ ...samplePersona, age: 31 }) + "\n```");

    expect(persona.age).toBe(31);
  });

  it("keeps empty lists and placeholder values as given", () => {
    const persona = parsePersonaResponse(
      JSON.stringify({ ...samplePersona, occupation: "N/A", frustrations: [], likings: [] })
    );

    expect(persona.occupation).toBe("N/A");
    expect(persona.frustrations).toEqual([]);
    expect(persona.likings).toEqual([]);
  });

  it("rejects text that is not JSON", () => {
    const error = parseError("Sorry, I cannot help with that.");

    expect(error.message).toMatch(/^Malformed persona response: invalid JSON/);
    expect(error.excerpt).toBe("Sorry, I cannot help with that.");
  });

  it("rejects an empty response", () => {
    expect(parseError("   ").message).toBe("Malformed persona response: empty response");
  });

  it("rejects a missing key", () => {
    const { goals: _goals, ...withoutGoals } = samplePersona;

    expect(parseError(JSON.stringify(withoutGoals)).message).toBe("Malformed persona response: goals: Required");
  });

  it("rejects extra or renamed keys", () => {
    const { personality_type, ...rest } = samplePersona;
    const error = parseError(JSON.stringify({ ...rest, mbti_personality: personality_type }));

    expect(error.message).toContain("personality_type: Required");
    expect(error.message).toContain("Unrecognized key(s) in object: 'mbti_personality'");
  });

  it("rejects lists of objects", () => {
    const error = parseError(
      JSON.stringify({ ...samplePersona, likings: [{ item: "Sci-fi", citation_url: "https://reddit.com/x" }] })
    );

    expect(error.message).toContain("likings.0: Expected string, received object");
  });

  it("truncates the excerpt of long responses", () => {
    expect(parseError("x".repeat(2000)).excerpt).toHaveLength(500);
  });
});
