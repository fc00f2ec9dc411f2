import type { ActivityItem, PersonaRecord } from "../../src/types/persona.js";

export const samplePersona: PersonaRecord = {
  name: "Alex S.",
  age: "25-35",
  occupation: "Software Developer",
  status: "Single",
  location: "North America, urban area",
  archetype: "The Analyst",
  personality_type: "INTJ",
  motivations: ["Wants to ship side projects"],
  behaviors: ["Posts late at night"],
  frustrations: ["Dislikes unclear documentation", "Slow build tools"],
  likings: ["Enjoys mechanical keyboards"],
  goals: ["Find a remote job"],
};

export const samplePersonaJson = JSON.stringify(samplePersona);

export function activity(kind: ActivityItem["kind"], text: string, iso: string, id: string): ActivityItem {
  return {
    kind,
    text,
    created_at: new Date(iso),
    permalink: `https://reddit.com/r/testing/comments/${id}/`,
    subreddit: "testing",
  };
}
