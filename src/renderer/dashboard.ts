import * as blessed from 'blessed';
import type { Widgets } from 'blessed';
import { CPU_ALERT_PERCENT } from '../shared/constants';
import type { MonitorFrame } from '../shared/types/monitor';
import { formatBytes, sparkline } from './format';
import {
  detailLines,
  diskLines,
  filterBarText,
  headerText,
  networkLines,
  processTableLabel,
  processTableLines,
} from './panels';
import { PALETTES } from './themes';
import type { Palette } from './themes';

/** Columns/rows a bordered box leaves for content */
function inner(el: Widgets.BoxElement, axis: 'width' | 'height'): number {
  const size = el[axis];
  return typeof size === 'number' ? Math.max(0, size - 2) : 0;
}

const last = (values: readonly number[]): number => values[values.length - 1] ?? 0;

/**
 * Dashboard — owns the blessed widgets and repaints them from a frame.
 *
 *   header
 *   CPU graph   | processes
 *   memory graph| filter bar
 *   CPU gauge   | memory gauge
 *   disks       | network
 *
 * The detail inspector floats over everything while a process is inspected.
 */
export class Dashboard {
  private readonly header: Widgets.BoxElement;
  private readonly cpuGraph: Widgets.BoxElement;
  private readonly memGraph: Widgets.BoxElement;
  private readonly processTable: Widgets.BoxElement;
  private readonly filterBar: Widgets.BoxElement;
  private readonly cpuGauge: Widgets.ProgressBarElement;
  private readonly memGauge: Widgets.ProgressBarElement;
  private readonly disks: Widgets.BoxElement;
  private readonly network: Widgets.BoxElement;
  private readonly detail: Widgets.BoxElement;

  constructor(screen: Widgets.Screen) {
    const panel = (options: Widgets.BoxOptions): Widgets.BoxElement =>
      blessed.box({ parent: screen, tags: true, border: { type: 'line' }, ...options });

    this.header = panel({ top: 0, left: 0, width: '100%', height: 3 });
    this.cpuGraph = panel({ top: 3, left: 0, width: '50%', height: '20%', label: ' CPU ' });
    this.memGraph = panel({ top: '20%+3', left: 0, width: '50%', height: '20%', label: ' Mem ' });
    this.processTable = panel({ top: 3, left: '50%', width: '50%', height: '40%-3' });
    this.filterBar = panel({ top: '40%', left: '50%', width: '50%', height: 3, label: ' Filter ' });

    const gauge = (left: string | number): Widgets.ProgressBarElement =>
      blessed.progressbar({
        parent: screen,
        top: '40%+3',
        left,
        width: '50%',
        height: 3,
        border: { type: 'line' },
        orientation: 'horizontal',
        filled: 0,
        style: { bar: { bg: 'green' } },
      });
    this.cpuGauge = gauge(0);
    this.memGauge = gauge('50%');

    this.disks = panel({ top: '40%+6', left: 0, width: '60%', height: '60%-6', label: ' Disks ' });
    this.network = panel({ top: '40%+6', left: '60%', width: '40%', height: '60%-6', label: ' Network ' });

    this.detail = panel({
      top: 'center',
      left: 'center',
      width: '60%',
      height: '50%',
      label: ' Process Detail ',
      hidden: true,
    });
  }

  update(frame: MonitorFrame): void {
    const palette = PALETTES[frame.theme];
    this.applyBorders(palette);

    this.header.setContent(headerText(frame, palette));

    this.cpuGraph.style.fg = palette.cpu;
    this.cpuGraph.setContent(sparkline(frame.history.cpu, inner(this.cpuGraph, 'width'), 100));
    this.memGraph.style.fg = palette.memory;
    this.memGraph.setContent(sparkline(frame.history.memory, inner(this.memGraph, 'width'), 100));

    this.processTable.setLabel(processTableLabel(frame.query));
    this.processTable.setContent(
      processTableLines(
        frame.view,
        frame.cursor,
        palette,
        inner(this.processTable, 'width'),
        inner(this.processTable, 'height'),
      ).join('\n'),
    );

    this.filterBar.style.fg = frame.mode.kind === 'search-edit' ? palette.editing : palette.muted;
    this.filterBar.setContent(filterBarText(frame));

    const cpu = Math.round(last(frame.history.cpu));
    this.cpuGauge.style.bar.bg = cpu > CPU_ALERT_PERCENT ? palette.alert : palette.cpu;
    this.cpuGauge.setProgress(cpu);
    this.cpuGauge.setContent(`CPU: ${cpu}%`);

    const mem = Math.round(last(frame.history.memory));
    this.memGauge.style.bar.bg = palette.memory;
    this.memGauge.setProgress(mem);
    this.memGauge.setContent(`MEM: ${mem}%`);

    this.disks.setContent(diskLines(frame.snapshot?.disks ?? [], inner(this.disks, 'width')).join('\n'));
    this.updateNetwork(frame, palette);
    this.updateDetail(frame);
  }

  private updateNetwork(frame: MonitorFrame, palette: Palette): void {
    const width = inner(this.network, 'width');
    const lines = networkLines(frame.snapshot?.interfaces ?? [], width);
    const graphWidth = Math.max(0, width - 14);

    lines.push(
      '',
      `{${palette.rx}-fg}RX ${sparkline(frame.history.rx, graphWidth)}{/} ${formatBytes(last(frame.history.rx))}/s`,
      `{${palette.tx}-fg}TX ${sparkline(frame.history.tx, graphWidth)}{/} ${formatBytes(last(frame.history.tx))}/s`,
    );
    this.network.setContent(lines.join('\n'));
  }

  private updateDetail(frame: MonitorFrame): void {
    if (frame.mode.kind !== 'detail-inspect') {
      this.detail.hide();
      return;
    }
    this.detail.setContent(detailLines(frame).join('\n'));
    this.detail.show();
    this.detail.setFront();
  }

  private applyBorders(palette: Palette): void {
    const boxes = [
      this.header,
      this.cpuGraph,
      this.memGraph,
      this.processTable,
      this.filterBar,
      this.cpuGauge,
      this.memGauge,
      this.disks,
      this.network,
      this.detail,
    ];
    for (const box of boxes) {
      box.style.border = { fg: palette.border };
    }
  }
}
