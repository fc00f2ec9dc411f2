import { writeFile } from "node:fs/promises";
import { Resvg } from "@resvg/resvg-js";
import type { PersonaRecord } from "../types/persona.js";
import type { Logger } from "../utils/logger.js";
import { layoutCard, renderCardSvg } from "./card-layout.js";
import { RenderIOError } from "./errors.js";

export interface RendererOptions {
  /** Extra font files to load before the system fonts. */
  fontFiles?: readonly string[];
}

export class CardRenderer {
  constructor(
    private readonly logger: Logger,
    private readonly options: RendererOptions = {}
  ) {}

  /** Rasterizes the persona card to PNG bytes. */
  toPng(persona: PersonaRecord): Buffer {
    const layout = layoutCard(persona);
    const svg = renderCardSvg(layout);
    const resvg = new Resvg(svg, {
      font: {
        fontFiles: [...(this.options.fontFiles ?? [])],
        loadSystemFonts: true,
        defaultFontFamily: "Arial",
      },
    });
    this.logger.debug("renderer", `Card laid out at ${layout.width}x${layout.height} with ${layout.lines.length} lines`);
    return resvg.render().asPng();
  }

  /** Writes the card to `outputPath`, replacing any existing file. */
  async render(persona: PersonaRecord, outputPath: string): Promise<void> {
    const png = this.toPng(persona);
    try {
      await writeFile(outputPath, png);
    } catch (error) {
      throw new RenderIOError(outputPath, { cause: error });
    }
    this.logger.info("renderer", `✅ Persona card saved to ${outputPath}`);
  }
}
