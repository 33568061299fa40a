// ═══════════════════════════════════════════════════════════════════════
// Human Query Configuration
// ═══════════════════════════════════════════════════════════════════════

export const HUMAN_QUERY_CONFIG = {
  /**
   * Active-item changes inside this window after display are the widget's own
   * initial focus, not the human, and do not disable the deadline.
   */
  engagementGraceMs: 250,

  /** Largest delay a timer accepts (2^31 - 1 ms); longer deadlines are clamped to it */
  maxDeadlineMs: 2_147_483_647,

  /** Appended to every item list; picking it opens free-text entry */
  otherItem: {
    label: 'Other',
    description: 'Enter custom value',
  },
} as const;
