/**
 * Scrollable, selectable list inside a bordered panel
 */

import { RESET } from './constants.js';
import { drawBox, fitText, innerRect, scrollOffsetFor } from './draw.js';
import type { Frame, Rect, Style } from './types.js';

export class ListPanel<T> {
  private items: readonly T[] = [];
  private selectedIndex = 0;
  private offset = 0;

  setItems(items: readonly T[]): void {
    this.items = items;
    this.selectedIndex = Math.min(this.selectedIndex, Math.max(0, items.length - 1));
    this.offset = 0;
  }

  getItems(): readonly T[] {
    return this.items;
  }

  selected(): T | null {
    return this.items[this.selectedIndex] ?? null;
  }

  getSelectedIndex(): number {
    return this.selectedIndex;
  }

  selectNext(): void {
    if (this.selectedIndex < this.items.length - 1) this.selectedIndex++;
  }

  selectPrevious(): void {
    if (this.selectedIndex > 0) this.selectedIndex--;
  }

  selectFirst(): void {
    this.selectedIndex = 0;
  }

  selectLast(): void {
    this.selectedIndex = Math.max(0, this.items.length - 1);
  }

  draw(
    frame: Frame,
    rect: Rect,
    options: {
      title: string;
      focused: boolean;
      style: Style;
      render: (item: T) => string;
      empty?: string;
    },
  ): void {
    const { title, focused, style, render, empty = '' } = options;
    drawBox(frame, rect, focused ? style.focusBorder : style.border, title);

    const inner = innerRect(rect);
    if (inner.width <= 0 || inner.height <= 0) return;

    if (this.items.length === 0) {
      frame.write(inner.x, inner.y, `${style.text}${fitText(empty, inner.width)}${RESET}`);
      return;
    }

    this.offset = scrollOffsetFor(this.selectedIndex, inner.height, this.offset);
    const visible = this.items.slice(this.offset, this.offset + inner.height);

    visible.forEach((item, row) => {
      const index = this.offset + row;
      const text = fitText(render(item), inner.width);
      let color = style.text;
      if (index === this.selectedIndex) {
        color = focused ? style.highlight : style.muted;
      }
      frame.write(inner.x, inner.y + row, `${color}${text}${RESET}`);
    });
  }
}
