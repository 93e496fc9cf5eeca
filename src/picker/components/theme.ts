/** Slate palette used by the picker view. */
export const ROW_BACKGROUND = '#020617';
export const ALT_ROW_BACKGROUND = '#0f172a';
export const SELECTED_BACKGROUND = '#1e293b';
export const TITLE_COLOR = 'green';

export const HIGHLIGHT_SYMBOL = '>';

export function rowBackground(index: number, selected: boolean): string {
  if (selected) return SELECTED_BACKGROUND;
  return index % 2 === 0 ? ROW_BACKGROUND : ALT_ROW_BACKGROUND;
}
