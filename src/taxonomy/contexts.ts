/**
 * Name-resolution contexts.
 * Maps iNaturalist iconic taxa to Open Tree TNRS context names so that
 * homonyms in unrelated lineages (e.g. a plant and an insect genus sharing
 * a name) resolve within the right part of the tree.
 */

import type { IconicTaxonTag, ObservationRecord, TaggedRecord } from '../types/models.js';

export const ALL_LIFE = 'All life';

export const ICONIC_TAXON_CONTEXTS: Readonly<Record<IconicTaxonTag, string>> = {
  Animalia: 'Animals',
  // TNRS has no ray-finned fish context
  Actinopterygii: 'Vertebrates',
  Aves: 'Birds',
  // nor a reptile one
  Reptilia: 'Tetrapods',
  Amphibia: 'Amphibians',
  Mammalia: 'Mammals',
  Arachnida: 'Arachnids',
  Insecta: 'Insects',
  Plantae: 'Land plants',
  Fungi: 'Fungi',
  Mollusca: 'Molluscs',
  Protozoa: ALL_LIFE,
  // kelps, diatoms and oomycetes all sit in SAR
  Chromista: 'SAR group',
  unknown: ALL_LIFE,
};

const CONTEXT_LOOKUP = new Map<string, string>(Object.entries(ICONIC_TAXON_CONTEXTS));

/** Unmapped tags fall back to the broadest context. */
export function contextFor(tag: string): string {
  return CONTEXT_LOOKUP.get(tag) ?? ALL_LIFE;
}

export function tagRecords(records: readonly ObservationRecord[]): TaggedRecord[] {
  return records.map((r) => ({ ...r, context: contextFor(r.iconicTaxonName) }));
}
