import type { CharWidth, RangeTableStore, WidthInput, WidthOptions } from '../types.js';
import { measureSource, sourceLength, toWidthSource } from './aggregate.js';
import { charWidth, toCodepoint } from './classify.js';
import { createWidthContext, type WidthContext } from './context.js';
import { fitInContext, type FitLayout } from './fit.js';

/**
 * Width calculator bound to one resolved Unicode version and table store.
 */
export class CellWidth {
  private readonly context: WidthContext;

  constructor(options: WidthOptions = {}) {
    this.context = createWidthContext(options);
  }

  get version(): string {
    return this.context.version;
  }

  get store(): RangeTableStore {
    return this.context.store;
  }

  charWidth(value: number | string): CharWidth {
    return charWidth(toCodepoint(value), this.context.version, this.context.store);
  }

  stringWidth(input: WidthInput, start?: number, end?: number): number {
    const source = toWidthSource(input);
    return measureSource(source, start ?? 0, end ?? sourceLength(source), this.context);
  }

  fit(text: string, width: number, layout: FitLayout = {}): string {
    return fitInContext(text, width, layout, this.context);
  }
}
