const CHANNELS = ['release', 'esr', 'beta', 'aurora', 'nightly'] as const;

export type NormalizedChannel = (typeof CHANNELS)[number] | 'Other';

const CCK_SUFFIX = /^([a-z]+)-cck-.+$/;

/**
 * Maps a raw update channel to the canonical channel vocabulary.
 *
 * Partner builds report `<channel>-cck-<partner>` and fold into their
 * base channel. Everything else, including a missing channel, is "Other".
 */
export function normalizeChannel(raw: unknown): NormalizedChannel {
  if (typeof raw !== 'string' || raw === '') return 'Other';

  const base = CCK_SUFFIX.exec(raw)?.[1] ?? raw;
  return isChannel(base) ? base : 'Other';
}

function isChannel(name: string): name is (typeof CHANNELS)[number] {
  return CHANNELS.some((channel) => channel === name);
}
