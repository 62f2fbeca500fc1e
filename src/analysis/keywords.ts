export const DEFUNCT_PHRASES = [
  'ceased operations',
  'defunct',
  'no longer operates',
  'discontinued',
  'liquidated',
  'bankrupt',
  'shut down',
  'stopped flying',
  'ended operations',
  'closed down',
  'ceased trading',
  'went out of business',
] as const;

export const OPERATING_PHRASES = [
  'currently operates',
  'operating',
  'operates flights',
  'active airline',
  'continues to operate',
  'flying',
  'serves destinations',
  'scheduled flights',
  'is operating',
] as const;

// Order matters: the first phrase that yields a successor wins.
export const RENAMED_PHRASES = [
  'renamed to',
  'rebranded as',
  'now known as',
  'changed its name to',
  'became',
  'merged with',
  'acquired by',
  'replaced by',
] as const;
