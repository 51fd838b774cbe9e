import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type ContainerOptions = WidgetOptions & {
  direction?: 'vertical' | 'horizontal';
  gap?: number;
  /** relative widths of the children, horizontal direction only */
  fractions?: number[];
};

/**
 * Stacks children vertically or places them side by side.
 */
export class Container extends Widget {
  private readonly widgets: Widget[];
  private readonly direction: 'vertical' | 'horizontal';
  private readonly gap: number;
  private readonly fractions?: number[];

  constructor(widgets: Widget[] = [], options: ContainerOptions = {}) {
    super(options);
    const direction = options.direction ?? 'vertical';
    if (options.fractions !== undefined) {
      if (direction !== 'horizontal') {
        throw new Error('fractions are only supported for horizontal containers');
      }
      if (options.fractions.length !== widgets.length) {
        throw new Error(
          `Number of fractions (${options.fractions.length}) does not match number of widgets (${widgets.length})`
        );
      }
    }
    this.widgets = widgets;
    this.direction = direction;
    this.gap = options.gap ?? 10;
    this.fractions = options.fractions;
    this.init();
  }

  public getJsonData(): JsonObject {
    return {};
  }

  public getJsonState(): JsonObject {
    return {};
  }

  protected getTemplateProps(): JsonObject {
    const props: JsonObject = { direction: this.direction, gap: this.gap };
    if (this.fractions !== undefined) {
      props.fractions = this.fractions.map((fraction) => `${fraction}fr`);
    }
    return props;
  }

  protected getChildren(): Widget[] {
    return this.widgets;
  }
}
