/**
 * sdftype/node - font files on disk
 *
 * Kept apart from the main entry so browser bundles never pull in node:fs.
 */

export {
  createDirectoryFontEnumerator,
  displayNameFromFile,
  readDisplayName,
  readFontFileSync,
} from "./font/fontDirectory";
