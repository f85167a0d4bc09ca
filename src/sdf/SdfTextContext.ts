/**
 * Shared state for SDF text: atlas cache, known fonts, tracked faces and the
 * built-in program. Create one per rendering context and destroy it at
 * shutdown; every `SdfText` and `Font` takes it explicitly.
 */

import { SdfTextError } from "../errors";
import { FaceTracker } from "../font/FaceTracker";
import { Font } from "../font/Font";
import type { FontLoader } from "../font/Font";
import { FontRegistry } from "../font/FontRegistry";
import type { FontRegistryOptions } from "../font/FontRegistry";
import { OpenTypeFontResource } from "../font/OpenTypeFontResource";
import type { FontResource, SdfRasterizer } from "../font/types";
import { AtlasCache } from "./AtlasCache";
import type { RenderBackend } from "./backend";
import { sdfFragmentShader, sdfVertexShader } from "./shaders";

export interface SdfTextContextOptions<TTexture, TProgram> {
  backend: RenderBackend<TTexture, TProgram>;
  rasterizer: SdfRasterizer;
  /** Font parser (default: opentype.js) */
  fontResource?: FontResource;
  fonts?: Partial<FontRegistryOptions>;
  /**
   * Reads font files found by the registry. Without one, loading a font by
   * name fails; on Node.js pass `readFontFileSync` from "sdftype/node".
   */
  readFontFile?: (path: string) => Uint8Array;
}

function noFontFileReader(path: string): Uint8Array {
  throw new SdfTextError("MissingResource", `No font file reader configured for ${path}`);
}

export class SdfTextContext<TTexture, TProgram> implements FontLoader {
  readonly backend: RenderBackend<TTexture, TProgram>;
  readonly rasterizer: SdfRasterizer;
  readonly fontResource: FontResource;
  readonly faces = new FaceTracker();
  readonly fonts: FontRegistry;
  readonly atlases: AtlasCache<TTexture, TProgram>;

  private readonly readFile: (path: string) => Uint8Array;
  private defaultProgram: TProgram | null = null;
  private programAttempted = false;
  private defaultFont: Font | null = null;
  private defaultFontAttempted = false;
  private _destroyed = false;

  constructor(options: SdfTextContextOptions<TTexture, TProgram>) {
    this.backend = options.backend;
    this.rasterizer = options.rasterizer;
    this.fontResource = options.fontResource ?? new OpenTypeFontResource();
    this.fonts = new FontRegistry(options.fonts);
    this.readFile = options.readFontFile ?? noFontFileReader;
    this.atlases = new AtlasCache(this.backend, this.rasterizer);
  }

  /**
   * Create a context and, when an enumerator is configured, load the list of
   * known fonts.
   */
  static async create<TTexture, TProgram>(
    options: SdfTextContextOptions<TTexture, TProgram>
  ): Promise<SdfTextContext<TTexture, TProgram>> {
    const context = new SdfTextContext(options);
    if (options.fonts?.enumerate) {
      await context.fonts.refresh();
    }
    return context;
  }

  readFontFile(path: string): Uint8Array {
    return this.readFile(path);
  }

  /**
   * The built-in program, created on first use. Creation is attempted once;
   * after a failure this returns null and text drawn without a caller program
   * is skipped.
   */
  getDefaultProgram(): TProgram | null {
    if (!this.programAttempted) {
      this.programAttempted = true;
      try {
        this.defaultProgram = this.backend.createProgram(sdfVertexShader, sdfFragmentShader);
      } catch (e) {
        console.error("[SdfText] Failed to create default program:", e);
      }
    }
    return this.defaultProgram;
  }

  /**
   * The configured default font, resolved by name on first use. Null when no
   * default is configured or it cannot be loaded.
   */
  getDefaultFont(): Font | null {
    if (!this.defaultFontAttempted) {
      this.defaultFontAttempted = true;
      const { defaultFontName, defaultFontSize } = this.fonts.options;
      if (defaultFontName !== null) {
        const result = Font.fromName(this, defaultFontName, defaultFontSize);
        if (result.ok) {
          this.defaultFont = result.value;
        } else {
          console.warn(`[FontRegistry] Default font unavailable: ${result.error.message}`);
        }
      }
    }
    return this.defaultFont;
  }

  /** Release atlas pages, then every face still tracked */
  destroy(): void {
    if (this._destroyed) return;
    this.atlases.clear();
    this.defaultFont?.release();
    this.defaultFont = null;
    this.faces.releaseAll();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
