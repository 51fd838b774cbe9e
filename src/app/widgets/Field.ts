import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

/**
 * Form row: a title and a description above an input widget.
 */
export class Field extends Widget {
  private readonly content: Widget;
  private readonly title: string;
  private readonly description?: string;

  constructor(content: Widget, title: string, description?: string, options: WidgetOptions = {}) {
    super(options);
    this.content = content;
    this.title = title;
    this.description = description;
    this.init();
  }

  public getJsonData(): JsonObject {
    return { title: this.title, description: this.description ?? null };
  }

  public getJsonState(): JsonObject {
    return {};
  }

  protected getChildren(): Widget[] {
    return [this.content];
  }
}
