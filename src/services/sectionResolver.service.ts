import fs from 'fs';
import path from 'path';
import { SectionCatalog } from '../types';

export interface SectionAvailability {
  available: string[];
  missing: string[];
}

/**
 * Loose matching key: case, whitespace and the separators `.`, `-` and `_`
 * never take part in a comparison.
 */
export const looseKey = (label: string): string =>
  String(label)
    .trim()
    .toLowerCase()
    .replace(/[\s._-]+/g, '');

const withoutCsvExtension = (filename: string): string => filename.replace(/\.csv$/i, '');

/**
 * Maps free-form section labels onto the catalog's canonical sections and
 * from there onto roster files in `rosterDir`.
 */
export class SectionResolver {
  private readonly aliasToCanonical: ReadonlyMap<string, string>;
  private readonly filenamesByCanonical: ReadonlyMap<string, readonly string[]>;

  constructor(private readonly catalog: SectionCatalog, private readonly rosterDir: string) {
    const aliases = new Map<string, string>();
    const filenames = new Map<string, readonly string[]>();

    for (const section of catalog.sections) {
      filenames.set(section.id, section.filenames);
      const labels = [section.id, ...section.aliases, ...section.filenames.map(withoutCsvExtension)];
      for (const label of labels) {
        const key = looseKey(label);
        if (!key) continue;
        const owner = aliases.get(key);
        if (owner && owner !== section.id) {
          throw new Error(`Alias "${label}" is claimed by both ${owner} and ${section.id}`);
        }
        aliases.set(key, section.id);
      }
    }

    this.aliasToCanonical = aliases;
    this.filenamesByCanonical = filenames;
  }

  get sections(): string[] {
    return this.catalog.sections.map((section) => section.id);
  }

  get periods(): readonly string[] {
    return this.catalog.periods;
  }

  isCanonical(section: string): boolean {
    return this.filenamesByCanonical.has(section);
  }

  /** Unknown labels pass through unchanged. */
  resolve(rawLabel: string): string {
    return this.aliasToCanonical.get(looseKey(rawLabel)) ?? rawLabel;
  }

  filenamesFor(canonicalId: string): string[] {
    const filenames = this.filenamesByCanonical.get(canonicalId);
    return filenames ? [...filenames] : [`${canonicalId}.csv`];
  }

  primaryFilename(canonicalId: string): string {
    return this.filenamesFor(canonicalId)[0];
  }

  /**
   * First existing candidate for the label's canonical section, then the
   * literal `{label}.csv`; null when neither exists.
   */
  locateRoster(rawLabel: string): string | null {
    const canonical = this.resolve(rawLabel);
    const candidates = [...this.filenamesFor(canonical), `${rawLabel}.csv`];
    for (const filename of candidates) {
      const candidate = path.join(this.rosterDir, path.basename(filename));
      if (fs.existsSync(candidate)) return candidate;
    }
    return null;
  }

  availability(): SectionAvailability {
    const available: string[] = [];
    const missing: string[] = [];
    for (const section of this.sections) {
      (this.locateRoster(section) ? available : missing).push(section);
    }
    return { available, missing };
  }
}
