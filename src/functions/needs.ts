import type { BranchRecord } from '../types';

export const NEEDS = [
  'has_french_resources',
  'has_electronic_resources',
  'has_print_resources',
  'has_website',
] as const;

export type Need = (typeof NEEDS)[number];

interface NeedDefinition {
  label: string;
  test: (record: BranchRecord) => boolean;
}

// Unknown counts never satisfy a need
const positive = (value: number | null): boolean => value !== null && value > 0;

export const NEED_DEFINITIONS: Record<Need, NeedDefinition> = {
  has_french_resources: {
    label: 'French-language resources',
    test: ({ stats }) => positive(stats.frenchPrintTitles) || positive(stats.frenchElectronicTitles),
  },
  has_electronic_resources: {
    label: 'e-Book and e-Audio resources',
    test: ({ stats }) => positive(stats.electronicTitles),
  },
  has_print_resources: {
    label: 'Print resources',
    test: ({ stats }) => positive(stats.printTitles),
  },
  has_website: {
    label: 'A website or e-mail contact',
    test: ({ website }) => website !== null && website.trim().length > 0,
  },
};

export function isNeed(value: string): value is Need {
  return NEEDS.some(need => need === value);
}

export function satisfiesNeeds(record: BranchRecord, needs: readonly Need[]): boolean {
  return needs.every(need => NEED_DEFINITIONS[need].test(record));
}

/** Unique needs in declaration order, so equivalent selections compare equal. */
export function canonicalNeeds(needs: readonly Need[]): Need[] {
  return NEEDS.filter(need => needs.includes(need));
}
