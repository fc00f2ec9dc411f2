import { z } from "zod";
import type { PersonaRecord } from "../types/persona.js";
import { MalformedPersonaResponseError } from "./errors.js";

const EXCERPT_LENGTH = 500;

const traitList = z.array(z.string());

export const personaSchema = z
  .object({
    name: z.string(),
    age: z.union([z.string(), z.number()]),
    occupation: z.string(),
    status: z.string(),
    location: z.string(),
    archetype: z.string(),
    personality_type: z.string(),
    motivations: traitList,
    behaviors: traitList,
    frustrations: traitList,
    likings: traitList,
    goals: traitList,
  })
  .strict();

const FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

/** Removes one Markdown code fence wrapped around the whole text, if any. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Parses a model response into a persona. Any deviation from the expected
 * shape (missing, extra or mistyped keys) is rejected.
 */
export function parsePersonaResponse(raw: string): PersonaRecord {
  const excerpt = raw.slice(0, EXCERPT_LENGTH);
  const text = stripCodeFence(raw);
  if (!text) {
    throw new MalformedPersonaResponseError("empty response", excerpt);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedPersonaResponseError(`invalid JSON (${reason})`, excerpt, { cause: error });
  }

  const result = personaSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedPersonaResponseError(describeIssues(result.error), excerpt, { cause: result.error });
  }

  const persona: PersonaRecord = {
    ...result.data,
    motivations: Object.freeze(result.data.motivations),
    behaviors: Object.freeze(result.data.behaviors),
    frustrations: Object.freeze(result.data.frustrations),
    likings: Object.freeze(result.data.likings),
    goals: Object.freeze(result.data.goals),
  };
  return Object.freeze(persona);
}
