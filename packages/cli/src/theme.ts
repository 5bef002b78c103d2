/** Terminal palette: teal accents on the default background. */
export const THEME = {
  /** Active status, labels, highlights */
  primary: '#2DD4BF',
  /** Borders, decorations */
  accent: '#0D9488',
  /** Inactive text */
  dim: '#6B7280',
  /** Inactive borders */
  dimBorder: '#374151',
  success: '#22C55E',
  error: '#EF4444',
  /** Approval prompts, breakpoints */
  warning: '#F59E0B',
  text: 'white',
  textDim: '#9CA3AF',
} as const;
