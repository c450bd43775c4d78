import type { HexColor } from '../common/types.js';

export const DEFAULT_PALETTE: readonly HexColor[] = [
  '#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4', '#FFEAA7',
  '#DDA0DD', '#98D8C8', '#F7DC6F', '#BB8FCE', '#85C1E9',
  '#F8C471', '#82E0AA', '#F1948A', '#5D6D7E', '#D2B4DE',
];
