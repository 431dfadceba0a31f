// Model identities the header and the model picker know about.

export interface ModelChoice {
  id: string;
  label: string;
  displayName: string;
  description: string;
}

export const MODEL_CHOICES: readonly ModelChoice[] = [
  {
    id: 'claude-sonnet-4-5-20250929',
    label: 'Default (recommended)',
    displayName: 'Sonnet 4.5',
    description: 'Best for everyday tasks',
  },
  {
    id: 'claude-opus-4-5-20251101',
    label: 'Opus',
    displayName: 'Opus 4.5',
    description: 'Most capable for complex work',
  },
  {
    id: 'claude-haiku-4-5-20251001',
    label: 'Haiku',
    displayName: 'Haiku 4.5',
    description: 'Fastest for quick answers',
  },
];

const ALIASES: Record<string, string> = {
  haiku: 'Haiku 4.5',
  sonnet: 'Sonnet 4.5',
  opus: 'Opus 4.5',
};

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Human name for a model id, e.g. "claude-opus-4-5-20251101" -> "Opus 4.5".
 * Ids that don't look like a model id come back unchanged.
 */
export function modelDisplayName(id: string): string {
  const alias = ALIASES[id.toLowerCase()];
  if (alias) return alias;

  const match = /^claude-([a-z]+)-(\d+)(?:-(\d{1,2}))?(?:-\d{8})?$/.exec(id);
  if (!match) return id;

  const [, family, major, minor] = match;
  return minor === undefined ? `${capitalize(family)} ${major}` : `${capitalize(family)} ${major}.${minor}`;
}

/** Index of a model in MODEL_CHOICES, 0 when it isn't listed */
export function modelChoiceIndex(id: string): number {
  const index = MODEL_CHOICES.findIndex((choice) => choice.id === id);
  return index === -1 ? 0 : index;
}
