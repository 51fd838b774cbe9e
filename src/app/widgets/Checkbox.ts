import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export class Checkbox extends Widget {
  private readonly label: string;
  private checked: boolean;

  constructor(label: string, checked = false, options: WidgetOptions = {}) {
    super(options);
    this.label = label;
    this.checked = checked;
    this.init();
  }

  public getJsonData(): JsonObject {
    return { label: this.label };
  }

  public getJsonState(): JsonObject {
    return { checked: this.checked };
  }

  public isChecked(): boolean {
    const checked = this.stateValue('checked');
    return typeof checked === 'boolean' ? checked : this.checked;
  }

  public check(): void {
    this.checked = true;
    this.updateState();
  }

  public uncheck(): void {
    this.checked = false;
    this.updateState();
  }

  public onChange(handler: (checked: boolean) => void | Promise<void>): void {
    this.context.addHandler(this.widgetId, 'change', () => handler(this.isChecked()));
  }
}
