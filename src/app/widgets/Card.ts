import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type CardOptions = WidgetOptions & {
  title?: string;
  description?: string;
  collapsable?: boolean;
  /** message shown over the card while it is locked */
  lockMessage?: string;
};

/**
 * A titled panel around one widget. Can be collapsed and locked.
 */
export class Card extends Widget {
  private readonly content?: Widget;
  private readonly title?: string;
  private readonly description?: string;
  private readonly collapsable: boolean;
  private readonly lockMessage: string;
  private collapsed = false;
  private disabled = false;

  constructor(content?: Widget, options: CardOptions = {}) {
    super(options);
    this.content = content;
    this.title = options.title;
    this.description = options.description;
    this.collapsable = options.collapsable ?? false;
    this.lockMessage = options.lockMessage ?? 'Card content is locked';
    this.init();
  }

  public getJsonData(): JsonObject {
    return {
      title: this.title ?? null,
      description: this.description ?? null,
      collapsable: this.collapsable
    };
  }

  public getJsonState(): JsonObject {
    return {
      collapsed: this.collapsed,
      disabled: { disabled: this.disabled, message: this.lockMessage }
    };
  }

  protected getChildren(): Widget[] {
    return this.content === undefined ? [] : [this.content];
  }

  public collapse(): void {
    if (!this.collapsable) {
      throw new Error(`Card "${this.widgetId}" is not collapsable`);
    }
    this.collapsed = true;
    this.updateState();
  }

  public uncollapse(): void {
    this.collapsed = false;
    this.updateState();
  }

  public lock(): void {
    this.disabled = true;
    this.updateState();
  }

  public unlock(): void {
    this.disabled = false;
    this.updateState();
  }

  public isLocked(): boolean {
    return this.disabled;
  }
}
