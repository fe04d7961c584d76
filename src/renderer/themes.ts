import type { ThemePreset } from '../shared/types/monitor';

/** blessed color names for each dashboard role */
export interface Palette {
  headerFg: string;
  headerBg: string;
  border: string;
  hint: string;
  cpu: string;
  memory: string;
  rx: string;
  tx: string;
  alert: string;
  columnHeader: string;
  selectionFg: string;
  selectionBg: string;
  editing: string;
  muted: string;
}

export const PALETTES: Record<ThemePreset, Palette> = {
  default: {
    headerFg: 'black',
    headerBg: 'cyan',
    border: 'cyan',
    hint: 'yellow',
    cpu: 'green',
    memory: 'magenta',
    rx: 'blue',
    tx: 'yellow',
    alert: 'red',
    columnHeader: 'yellow',
    selectionFg: 'white',
    selectionBg: 'red',
    editing: 'yellow',
    muted: 'gray',
  },
  ocean: {
    headerFg: 'white',
    headerBg: 'blue',
    border: 'blue',
    hint: 'cyan',
    cpu: 'cyan',
    memory: 'blue',
    rx: 'green',
    tx: 'cyan',
    alert: 'red',
    columnHeader: 'cyan',
    selectionFg: 'black',
    selectionBg: 'cyan',
    editing: 'cyan',
    muted: 'gray',
  },
  forest: {
    headerFg: 'black',
    headerBg: 'green',
    border: 'green',
    hint: 'yellow',
    cpu: 'green',
    memory: 'yellow',
    rx: 'green',
    tx: 'yellow',
    alert: 'red',
    columnHeader: 'green',
    selectionFg: 'black',
    selectionBg: 'yellow',
    editing: 'yellow',
    muted: 'gray',
  },
  mono: {
    headerFg: 'black',
    headerBg: 'white',
    border: 'white',
    hint: 'white',
    cpu: 'white',
    memory: 'white',
    rx: 'white',
    tx: 'white',
    alert: 'white',
    columnHeader: 'white',
    selectionFg: 'black',
    selectionBg: 'white',
    editing: 'white',
    muted: 'gray',
  },
};
