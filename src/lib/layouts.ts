import type { LayoutName } from '../types';

export interface LayoutPalette {
  primary: string;
  secondary: string;
  text: string;
  pending: string;
  correct: string;
  incorrect: string;
  background: string;
}

export const LAYOUT_PALETTES: Record<LayoutName, LayoutPalette> = {
  classic: {
    primary: '#805cbf',
    secondary: '#999999',
    text: '#e0e0e0',
    pending: '#7a7a7a',
    correct: '#805cbf',
    incorrect: '#e05561',
    background: '#1c1c22',
  },
  ocean: {
    primary: '#4fa3d1',
    secondary: '#6c8ea4',
    text: '#dce9f2',
    pending: '#5f7380',
    correct: '#6fd3e8',
    incorrect: '#f07167',
    background: '#0f1c26',
  },
  ember: {
    primary: '#e8873a',
    secondary: '#a4806c',
    text: '#f4e4d8',
    pending: '#806a5f',
    correct: '#f2b134',
    incorrect: '#d7263d',
    background: '#24160f',
  },
  forest: {
    primary: '#6ba368',
    secondary: '#7d9474',
    text: '#e2eddc',
    pending: '#66735f',
    correct: '#9bd18f',
    incorrect: '#e4572e',
    background: '#131e14',
  },
};

export function getLayoutPalette(layout: LayoutName): LayoutPalette {
  return LAYOUT_PALETTES[layout];
}
