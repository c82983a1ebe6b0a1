import { describe, it, expect } from 'vitest';
import { ALL_LIFE, ICONIC_TAXON_CONTEXTS, contextFor, tagRecords } from '../../src/taxonomy/contexts.js';
import { ICONIC_TAXA } from '../../src/types/models.js';

describe('contextFor', () => {
  it('should map iconic taxa to TNRS contexts', () => {
    expect(contextFor('Insecta')).toBe('Insects');
    expect(contextFor('Aves')).toBe('Birds');
    expect(contextFor('Plantae')).toBe('Land plants');
    expect(contextFor('Actinopterygii')).toBe('Vertebrates');
    expect(contextFor('Chromista')).toBe('SAR group');
  });

  it('should fall back to All life for unknown or unmapped tags', () => {
    expect(contextFor('unknown')).toBe(ALL_LIFE);
    expect(contextFor('Bacteria')).toBe('All life');
    expect(contextFor('toString')).toBe('All life');
  });

  it('should cover every iconic taxon', () => {
    for (const taxon of ICONIC_TAXA) {
      expect(ICONIC_TAXON_CONTEXTS[taxon]).toBeTruthy();
    }
  });
});

describe('tagRecords', () => {
  it('should add a context to each record and keep duplicates', () => {
    const tagged = tagRecords([
      { taxonName: 'Apis mellifera', taxonId: 47219, iconicTaxonName: 'Insecta', iconicTaxonId: 47158 },
      { taxonName: 'Apis mellifera', taxonId: 47219, iconicTaxonName: 'Insecta', iconicTaxonId: 47158 },
      { taxonName: 'Life', taxonId: 48460, iconicTaxonName: 'unknown', iconicTaxonId: null },
    ]);
    expect(tagged.map((r) => r.context)).toEqual(['Insects', 'Insects', 'All life']);
    expect(tagged[0]).toMatchObject({ taxonName: 'Apis mellifera', taxonId: 47219 });
  });
});
