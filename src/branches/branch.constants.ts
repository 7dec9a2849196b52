export const BRANCH_COLORS = [
  '#3498db',
  '#e74c3c',
  '#2ecc71',
  '#f39c12',
  '#9b59b6',
  '#1abc9c',
  '#d35400',
  '#34495e',
] as const;

/** SVG-style dash arrays; an empty list draws a solid line. */
export const BRANCH_LINE_STYLES = [
  { id: 'solid', dash: [] },
  { id: 'dashed', dash: [5, 5] },
  { id: 'dotted', dash: [1, 1] },
  { id: 'dash-dot', dash: [3, 5, 1, 5] },
] as const;
