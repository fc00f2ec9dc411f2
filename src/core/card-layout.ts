import type { PersonaListField, PersonaRecord } from "../types/persona.js";

export const CARD_WIDTH = 800;
export const CARD_MIN_HEIGHT = 1200;
export const MARGIN_X = 60;
export const FIELD_WRAP_CHARS = 80;
export const BULLET_WRAP_CHARS = 72;

export const EMPTY_VALUE = "N/A";
export const EMPTY_SECTION = "• No specific data inferred.";

export const COLORS = {
  background: "#fafafa",
  text: "#323232",
  header: "#1e1e1e",
  section: "#464646",
  accent: "#6496ff",
  muted: "#969696",
} as const;

export interface CardLine {
  x: number;
  /** Baseline position. */
  y: number;
  text: string;
  size: number;
  bold: boolean;
  color: string;
}

export interface CardLayout {
  width: number;
  height: number;
  lines: CardLine[];
}

export const SECTIONS: ReadonlyArray<{ title: string; field: PersonaListField }> = [
  { title: "Frustrations", field: "frustrations" },
  { title: "Likings", field: "likings" },
  { title: "Motivations", field: "motivations" },
  { title: "Behavior & Habits", field: "behaviors" },
  { title: "Goals & Needs", field: "goals" },
];

/**
 * Greedy word wrap at `width` characters. Words longer than a line are split
 * across lines. Returns no lines for blank text.
 */
export function wrapText(text: string, width: number): string[] {
  const size = Math.max(1, Math.floor(width));
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (let word of words) {
    while (word.length > size) {
      if (current) {
        lines.push(current);
        current = "";
      }
      lines.push(word.slice(0, size));
      word = word.slice(size);
    }
    if (!word) continue;

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= size) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function displayValue(value: string | number): string {
  const text = String(value).trim();
  return text || EMPTY_VALUE;
}

/** Positions every line of the card. Pure; the same persona always gives the same layout. */
export function layoutCard(persona: PersonaRecord): CardLayout {
  const lines: CardLine[] = [];
  let y = 40;

  const put = (x: number, text: string, size: number, color: string, bold = false) => {
    lines.push({ x, y: y + size, text, size, bold, color });
  };

  put(MARGIN_X, "User Persona Card", 40, COLORS.header, true);
  y += 60;
  put(MARGIN_X, displayValue(persona.name), 32, COLORS.accent, true);
  y += 42;
  put(MARGIN_X, displayValue(persona.archetype), 18, COLORS.section);
  y += 40;

  put(MARGIN_X, "Basic Information", 22, COLORS.section, true);
  y += 34;
  const fields: Array<[string, string | number]> = [
    ["Age", persona.age],
    ["Occupation", persona.occupation],
    ["Status", persona.status],
    ["Location", persona.location],
    ["Archetype", persona.archetype],
    ["Personality", persona.personality_type],
  ];
  for (const [label, value] of fields) {
    for (const line of wrapText(`${label}: ${displayValue(value)}`, FIELD_WRAP_CHARS)) {
      put(MARGIN_X + 10, line, 16, COLORS.text);
      y += 25;
    }
  }
  y += 20;

  for (const { title, field } of SECTIONS) {
    put(MARGIN_X, title, 22, COLORS.section, true);
    y += 34;

    const entries = persona[field].map((entry) => entry.trim()).filter(Boolean);
    if (entries.length === 0) {
      put(MARGIN_X + 10, EMPTY_SECTION, 16, COLORS.muted);
      y += 25;
    }
    for (const entry of entries) {
      wrapText(entry, BULLET_WRAP_CHARS).forEach((line, i) => {
        put(MARGIN_X + 10, `${i === 0 ? "• " : "  "}${line}`, 16, COLORS.text);
        y += 22;
      });
      y += 4;
    }
    y += 20;
  }

  return {
    width: CARD_WIDTH,
    height: Math.max(CARD_MIN_HEIGHT, y + 40),
    lines,
  };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function renderCardSvg(layout: CardLayout): string {
  const { width, height } = layout;
  const text = layout.lines
    .map(
      (line) =>
        `  <text x="${line.x}" y="${line.y}" font-size="${line.size}" font-weight="${line.bold ? "bold" : "normal"}" fill="${line.color}" xml:space="preserve">${escapeXml(line.text)}</text>`
    )
    .join("\n");

  return `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg" font-family="Arial, Helvetica, sans-serif">
  <rect width="${width}" height="${height}" fill="${COLORS.background}"/>
  <rect x="${MARGIN_X}" y="92" width="${width - 2 * MARGIN_X}" height="3" fill="${COLORS.accent}"/>
${text}
</svg>`;
}
