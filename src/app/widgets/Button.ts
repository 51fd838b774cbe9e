import { JsonObject } from '../../io/json';
import { Widget, WidgetHandler, WidgetOptions } from './Widget';

export type ButtonType = 'primary' | 'info' | 'warning' | 'danger' | 'success' | 'text';

export type ButtonOptions = WidgetOptions & {
  buttonType?: ButtonType;
  plain?: boolean;
  icon?: string;
};

export class Button extends Widget {
  private text: string;
  private readonly buttonType: ButtonType;
  private readonly plain: boolean;
  private readonly icon?: string;
  private loading = false;
  private disabled = false;

  constructor(text = 'Button', options: ButtonOptions = {}) {
    super(options);
    this.text = text;
    this.buttonType = options.buttonType ?? 'primary';
    this.plain = options.plain ?? false;
    this.icon = options.icon;
    this.init();
  }

  public getJsonData(): JsonObject {
    return {
      text: this.text,
      button_type: this.buttonType,
      plain: this.plain,
      icon: this.icon ?? null,
      loading: this.loading,
      disabled: this.disabled
    };
  }

  public getJsonState(): JsonObject {
    return {};
  }

  public setText(text: string): void {
    this.text = text;
    this.updateData();
  }

  public setLoading(loading: boolean): void {
    this.loading = loading;
    this.updateData();
  }

  public disable(): void {
    this.disabled = true;
    this.updateData();
  }

  public enable(): void {
    this.disabled = false;
    this.updateData();
  }

  /**
   * Registers a click handler. While a handler runs the button shows a
   * spinner; clicks on a disabled button are ignored.
   */
  public click(handler: () => void | Promise<void>): void {
    const wrapped: WidgetHandler = async () => {
      if (this.disabled) {
        return;
      }
      this.setLoading(true);
      try {
        await handler();
      } finally {
        this.setLoading(false);
      }
    };
    this.context.addHandler(this.widgetId, 'click', wrapped);
  }
}
