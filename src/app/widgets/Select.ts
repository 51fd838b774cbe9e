import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type SelectItem = {
  value: string;
  label?: string;
  disabled?: boolean;
};

export type SelectOptions = WidgetOptions & {
  filterable?: boolean;
  placeholder?: string;
};

export class Select extends Widget {
  private items: SelectItem[];
  private value: string | null;
  private readonly filterable: boolean;
  private readonly placeholder: string;

  constructor(items: SelectItem[], options: SelectOptions = {}) {
    super(options);
    this.items = items;
    this.value = items.length > 0 ? items[0].value : null;
    this.filterable = options.filterable ?? false;
    this.placeholder = options.placeholder ?? 'select';
    this.init();
  }

  public getJsonData(): JsonObject {
    return {
      items: this.items.map((item) => ({
        value: item.value,
        label: item.label ?? item.value,
        disabled: item.disabled ?? false
      })),
      filterable: this.filterable,
      placeholder: this.placeholder
    };
  }

  public getJsonState(): JsonObject {
    return { value: this.value };
  }

  public getValue(): string | null {
    const value = this.stateValue('value');
    return typeof value === 'string' ? value : this.value;
  }

  public setValue(value: string): void {
    if (!this.items.some((item) => item.value === value)) {
      throw new Error(`Value "${value}" is not among the items of select "${this.widgetId}"`);
    }
    this.value = value;
    this.updateState();
  }

  /**
   * Replaces the items. The selection falls back to the first item when the
   * selected value is gone.
   */
  public setItems(items: SelectItem[]): void {
    this.items = items;
    if (!items.some((item) => item.value === this.getValue())) {
      this.value = items.length > 0 ? items[0].value : null;
      this.updateState();
    }
    this.updateData();
  }

  public onChange(handler: (value: string | null) => void | Promise<void>): void {
    this.context.addHandler(this.widgetId, 'change', () => handler(this.getValue()));
  }
}
