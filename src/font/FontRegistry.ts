/**
 * Font Registry
 *
 * Known fonts from the platform enumerator, with fuzzy name-to-file resolution.
 */

import { withDefaults } from "../options";
import type { FontEnumerator, FontInfo } from "./types";

export interface FontRegistryOptions {
  /** Lists installed fonts */
  enumerate: FontEnumerator;
  /** Extra attempts when enumeration comes back empty */
  maxEnumerationRetries: number;
  /** Delay between attempts (ms) */
  retryDelayMs: number;
  /** Name of the process default font, resolved through this registry */
  defaultFontName: string | null;
  defaultFontSize: number;
}

export const DEFAULT_FONT_REGISTRY_OPTIONS: FontRegistryOptions = {
  enumerate: () => [],
  maxEnumerationRetries: 5,
  retryDelayMs: 10,
  defaultFontName: null,
  defaultFontSize: 32,
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class FontRegistry {
  readonly options: FontRegistryOptions;
  private fonts = new Map<string, FontInfo>();
  private enumerated = false;

  constructor(options: Partial<FontRegistryOptions> = {}) {
    this.options = withDefaults(DEFAULT_FONT_REGISTRY_OPTIONS, options);
  }

  /**
   * Re-run the enumerator and replace the known font list.
   *
   * An empty listing is retried up to `maxEnumerationRetries` times before
   * being accepted as "no fonts".
   */
  async refresh(): Promise<void> {
    const { enumerate, maxEnumerationRetries, retryDelayMs } = this.options;

    let infos = enumerate();
    let attempts = 1;
    while (infos.length === 0 && attempts <= maxEnumerationRetries) {
      await delay(retryDelayMs);
      infos = enumerate();
      attempts++;
    }

    if (infos.length === 0) {
      console.warn(`[FontRegistry] No fonts found after ${attempts} attempts`);
    }

    this.fonts.clear();
    for (const info of infos) {
      this.register(info);
    }
    this.enumerated = true;
  }

  /**
   * Display names of every known font. Enumerates on first use.
   *
   * @param forceRefresh - Enumerate again even if already done
   */
  async getNames(forceRefresh = false): Promise<string[]> {
    if (forceRefresh || !this.enumerated) {
      await this.refresh();
    }
    const names = new Set<string>();
    for (const info of this.fonts.values()) {
      names.add(info.name);
    }
    return [...names];
  }

  /**
   * Add a font. The key is lowercased; a key already present keeps its first
   * entry. Keys containing "regular" are also registered without it.
   */
  register(info: FontInfo): void {
    const key = info.key.toLowerCase();
    this.add({ ...info, key });

    if (key.includes("regular")) {
      const bare = key.replace("regular", "").replace(/\s+/g, " ").trim();
      if (bare.length > 0) {
        this.add({ ...info, key: bare });
      }
    }
  }

  /**
   * Find the best match for a human-entered font name.
   *
   * Each known key scores the summed length of the query's whitespace
   * separated tokens it contains, divided by its own length. The highest
   * score wins; ties keep the font registered first.
   */
  resolve(name: string): FontInfo | null {
    const tokens = name.toLowerCase().split(" ").filter((t) => t.length > 0);

    let best: FontInfo | null = null;
    let bestScore = 0;
    for (const info of this.fonts.values()) {
      let hits = 0;
      for (const token of tokens) {
        if (info.key.includes(token)) hits += token.length;
      }
      if (hits === 0) continue;

      const score = hits / info.key.length;
      if (score > bestScore) {
        best = info;
        bestScore = score;
      }
    }
    return best;
  }

  get size(): number {
    return this.fonts.size;
  }

  private add(info: FontInfo): void {
    if (!this.fonts.has(info.key)) {
      this.fonts.set(info.key, info);
    }
  }
}
