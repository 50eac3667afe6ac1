import fs from 'fs';
import { z } from 'zod';
import { SectionCatalog } from '../types';

const catalogSchema = z.object({
  periods: z.array(z.string().trim().min(1)).min(1),
  sections: z
    .array(
      z.object({
        id: z.string().trim().min(1),
        aliases: z.array(z.string()).default([]),
        filenames: z.array(z.string().trim().min(1)).min(1),
      })
    )
    .min(1),
});

const deepFreeze = (catalog: SectionCatalog): SectionCatalog =>
  Object.freeze({
    periods: Object.freeze([...catalog.periods]),
    sections: Object.freeze(
      catalog.sections.map((section) =>
        Object.freeze({
          id: section.id,
          aliases: Object.freeze([...section.aliases]),
          filenames: Object.freeze([...section.filenames]),
        })
      )
    ),
  });

export const parseSectionCatalog = (raw: unknown): SectionCatalog => {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid section catalog: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
  }
  const ids = parsed.data.sections.map((s) => s.id);
  const duplicate = ids.find((id, i) => ids.indexOf(id) !== i);
  if (duplicate) throw new Error(`Invalid section catalog: section ${duplicate} is defined twice`);
  return deepFreeze(parsed.data);
};

export const loadSectionCatalog = (filePath: string): SectionCatalog => {
  const text = fs.readFileSync(filePath, 'utf-8');
  return parseSectionCatalog(JSON.parse(text));
};
