/**
 * Workshop tags kept in the metadata cache, in their canonical spelling.
 * Anything else found on a page is ignored.
 */
export const ALLOWED_TAGS: readonly string[] = [
  'Build 40',
  'Build 41',
  'Build 42',
  'Animals',
  'Audio',
  'Balance',
  'Building',
  'Clothing/Armor',
  'Farming',
  'Food',
  'Framework',
  'Hardmode',
  'Interface',
  'Items',
  'Language/Translation',
  'Literature',
  'Map',
  'Military',
  'Misc',
  'Models',
  'Multiplayer',
  'Pop Culture',
  'QoL',
  'Realistic',
  'Silly/Fun',
  'Skills',
  'Textures',
  'Traits',
  'Vehicles',
  'Weapons',
  'WIP',
];

const CANONICAL_TAGS = new Map(ALLOWED_TAGS.map((tag) => [tag.toLowerCase(), tag]));

export function canonicalTag(candidate: string): string | undefined {
  return CANONICAL_TAGS.get(candidate.replace(/\s+/g, ' ').trim().toLowerCase());
}
