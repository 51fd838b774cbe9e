import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type FlexAlignment = 'start' | 'end' | 'center' | 'stretch' | 'baseline';

export type FlexboxOptions = WidgetOptions & {
  /** pixels between children */
  gap?: number;
  centerContent?: boolean;
  verticalAlignment?: FlexAlignment;
};

/**
 * Lays children out in a row.
 */
export class Flexbox extends Widget {
  private readonly widgets: Widget[];
  private readonly gap: number;
  private readonly centerContent: boolean;
  private readonly verticalAlignment?: FlexAlignment;

  constructor(widgets: Widget[], options: FlexboxOptions = {}) {
    super(options);
    this.widgets = widgets;
    this.gap = options.gap ?? 10;
    this.centerContent = options.centerContent ?? false;
    this.verticalAlignment = options.verticalAlignment;
    this.init();
  }

  public getJsonData(): JsonObject {
    return { center: this.centerContent };
  }

  public getJsonState(): JsonObject {
    return {};
  }

  protected getTemplateProps(): JsonObject {
    const props: JsonObject = { gap: this.gap };
    if (this.verticalAlignment !== undefined) {
      props.verticalAlignment = this.verticalAlignment;
    }
    return props;
  }

  protected getChildren(): Widget[] {
    return this.widgets;
  }
}
