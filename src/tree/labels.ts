/**
 * Open Tree node label helpers.
 * With label_format=name_and_id, labels look like `Apis_mellifera_ott7073`;
 * unnamed internal nodes are `mrcaott123ott456`.
 */

const OTT_SUFFIX = /_ott(\d+)$/;
const OTT_ONLY = /^ott(\d+)$/;
const MRCA = /^mrcaott\d+ott\d+$/;

/** `Apis_mellifera_ott7073` → `Apis mellifera`. */
export function displayLabel(label: string): string {
  return label.replace(OTT_SUFFIX, '').replace(/_/g, ' ').trim();
}

/** OTT id carried by a label, or null when it has none. */
export function ottIdOf(label: string): number | null {
  const match = OTT_SUFFIX.exec(label) ?? OTT_ONLY.exec(label);
  return match ? Number(match[1]) : null;
}

/** Synthetic MRCA labels name no clade. */
export function isMrcaLabel(label: string): boolean {
  return MRCA.test(label);
}
