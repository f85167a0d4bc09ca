import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import * as path from "node:path";

import { OpenTypeFontResource } from "./OpenTypeFontResource";
import type { FontEnumerator, FontInfo, FontResource } from "./types";

const FONT_EXTENSIONS = new Set([".ttf", ".otf", ".ttc"]);

export function readFontFileSync(file: string): Uint8Array {
  return new Uint8Array(readFileSync(file));
}

/** "OpenSans-BoldItalic" -> "Open Sans Bold Italic" */
export function displayNameFromFile(fileName: string): string {
  const stem = path.basename(fileName, path.extname(fileName));
  return stem
    .replace(/[-_]+/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Display name of a font file: the face's full name, or the name derived from
 * the file name when the file cannot be parsed or has no full name.
 */
export function readDisplayName(file: string, fontResource: FontResource): string {
  const face = fontResource.loadFace(readFontFileSync(file));
  if (!face.ok) return displayNameFromFile(file);

  const name = face.value.fullName;
  face.value.dispose();
  return name ?? displayNameFromFile(file);
}

/**
 * Enumerator over font files in the given directories (not recursive).
 * Directories that do not exist are skipped. Files are listed in name order
 * within each directory, directories in the order given.
 */
export function createDirectoryFontEnumerator(
  dirs: string[],
  fontResource: FontResource = new OpenTypeFontResource()
): FontEnumerator {
  return () => {
    const fonts: FontInfo[] = [];
    for (const dir of dirs) {
      if (!existsSync(dir) || !statSync(dir).isDirectory()) continue;

      for (const file of readdirSync(dir).sort()) {
        if (!FONT_EXTENSIONS.has(path.extname(file).toLowerCase())) continue;
        const fontPath = path.join(dir, file);
        const name = readDisplayName(fontPath, fontResource);
        fonts.push({ key: name.toLowerCase(), name, path: fontPath });
      }
    }
    return fonts;
  };
}
