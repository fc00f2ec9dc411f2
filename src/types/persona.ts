export type ActivityKind = "submission" | "comment";

export interface ActivityItem {
  readonly kind: ActivityKind;
  readonly text: string;
  readonly created_at: Date;
  readonly permalink: string;
  readonly subreddit: string;
}

export interface PersonaRecord {
  readonly name: string;
  readonly age: string | number;
  readonly occupation: string;
  readonly status: string;
  readonly location: string;
  readonly archetype: string;
  readonly personality_type: string;
  readonly motivations: readonly string[];
  readonly behaviors: readonly string[];
  readonly frustrations: readonly string[];
  readonly likings: readonly string[];
  readonly goals: readonly string[];
}

export type PersonaListField = {
  [K in keyof PersonaRecord]: PersonaRecord[K] extends readonly string[] ? K : never;
}[keyof PersonaRecord];
