import type { ActivityItem } from "../types/persona.js";

export const NO_ACTIVITY_NOTICE = "No public posts or comments found for this user.";

const INSTRUCTIONS = `You are an expert UX researcher creating a user persona from a Reddit user's public activity.
Your output MUST be a single valid JSON object and nothing else.

Infer the attributes below. If a single-value attribute cannot be confidently inferred, set it to "N/A".
If nothing can be inferred for a list attribute, use an empty list. Every key must be present, and no other keys may appear.
Each list entry is one short sentence describing an observation; where possible end it with the supporting URL from the data in parentheses.

JSON structure:
{
  "name": "string: fictional name, e.g. \\"Alex S.\\"",
  "age": "string or number: estimated age or age range, e.g. \\"25-35\\"",
  "occupation": "string: inferred occupation, e.g. \\"Software Developer\\"",
  "status": "string: inferred relationship status, e.g. \\"Single\\"",
  "location": "string: inferred general location, e.g. \\"North America, urban area\\"",
  "archetype": "string: user archetype, e.g. \\"The Explorer\\"",
  "personality_type": "string: MBTI-style type or descriptive traits, e.g. \\"INTJ\\"",
  "motivations": ["string"],
  "behaviors": ["string: behaviours and habits"],
  "frustrations": ["string"],
  "likings": ["string"],
  "goals": ["string: goals and needs"]
}

Be precise and concise.`;

function serializeItem(item: ActivityItem, index: number): string {
  const label = item.kind === "submission" ? "SUBMISSION" : "COMMENT";
  return [
    `--- ${label} ${index} ---`,
    `Date: ${item.created_at.toISOString()}`,
    `Subreddit: r/${item.subreddit}`,
    `Content: ${item.text}`,
    `URL: ${item.permalink}`,
  ].join("\n");
}

/** Instruction template followed by the serialized activity. */
export function buildPersonaPrompt(items: readonly ActivityItem[]): string {
  const counters = { submission: 0, comment: 0 };
  const blocks = items.map((item) => serializeItem(item, ++counters[item.kind]));

  const data = blocks.length > 0 ? blocks.join("\n\n") : NO_ACTIVITY_NOTICE;
  return `${INSTRUCTIONS}\n\n### USER'S REDDIT ACTIVITY DATA:\n\n${data}\n`;
}
