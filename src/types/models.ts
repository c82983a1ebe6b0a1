/**
 * Domain models — what the pipeline stages pass to each other.
 * Decoupled from the external API payload shapes in types/api.ts.
 */

// ── Observations ──

/** iNaturalist's coarse classification of an observed taxon. */
export const ICONIC_TAXA = [
  'Animalia',
  'Actinopterygii',
  'Aves',
  'Reptilia',
  'Amphibia',
  'Mammalia',
  'Arachnida',
  'Insecta',
  'Plantae',
  'Fungi',
  'Protozoa',
  'Mollusca',
  'Chromista',
] as const;

export type IconicTaxon = (typeof ICONIC_TAXA)[number];

export type IconicTaxonTag = IconicTaxon | 'unknown';

/** One identified observation, flattened to the columns the pipeline uses. */
export interface ObservationRecord {
  taxonName: string;
  taxonId: number;
  iconicTaxonName: IconicTaxonTag;
  /** Null when the provider reported no iconic taxon. */
  iconicTaxonId: number | null;
}

export interface ObservationQuery {
  userId?: string;
  projectId?: string;
  /** Reserved; accepted but not yet applied to the request or the output. */
  iconicTaxon?: string;
}

/** A validated page, as handed to the retriever by the observation provider. */
export interface ObservationPage {
  totalResults: number;
  perPage: number;
  page: number;
  records: ObservationRecord[];
  /** Results dropped because they carry no taxon (unidentified observations). */
  skipped: number;
}

// ── Taxonomy ──

/** An observation record with the name-resolution context it belongs to. */
export interface TaggedRecord extends ObservationRecord {
  context: string;
}

export interface NameMatch {
  matchedName: string;
  ottId: number;
  score: number;
  /** Whether the taxon is part of the synthetic tree (not suppressed). */
  inSynthesisTree: boolean;
}

export interface NameResolution {
  searchName: string;
  matches: NameMatch[];
}

export interface ResolvedTaxon {
  searchName: string;
  matchedName: string;
  ottId: number;
  score: number;
  context: string;
}

// ── Trees ──

export type LabelFormat = 'name' | 'id' | 'name_and_id';

export interface TreeNode {
  label: string | null;
  branchLength: number | null;
  children: TreeNode[];
}

// ── Annotation / rendering ──

export interface HighlightDirective {
  /** Unified node index of the clade root. */
  node: number;
  group: string;
  colour: string;
}

export interface LabelDirective {
  node: number;
  text: string;
  /** Optional image reference drawn next to the label. */
  image?: string;
}

export interface NodeAnnotation {
  highlights: HighlightDirective[];
  labels: LabelDirective[];
}

export interface RenderedFigure {
  format: 'svg' | 'png';
  mimeType: string;
  data: Buffer;
}
