import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type InputOptions = WidgetOptions & {
  placeholder?: string;
  readonly?: boolean;
  maxlength?: number;
};

export class Input extends Widget {
  private readonly placeholder: string;
  private readonly readonly: boolean;
  private readonly maxlength?: number;
  private value: string;

  constructor(value = '', options: InputOptions = {}) {
    super(options);
    this.value = value;
    this.placeholder = options.placeholder ?? '';
    this.readonly = options.readonly ?? false;
    this.maxlength = options.maxlength;
    this.init();
  }

  public getJsonData(): JsonObject {
    return {
      placeholder: this.placeholder,
      readonly: this.readonly,
      maxlength: this.maxlength ?? null
    };
  }

  public getJsonState(): JsonObject {
    return { value: this.value };
  }

  /** Value typed by the user, or last set by the server. */
  public getValue(): string {
    const value = this.stateValue('value');
    return typeof value === 'string' ? value : this.value;
  }

  public setValue(value: string): void {
    if (this.maxlength !== undefined && value.length > this.maxlength) {
      throw new RangeError(`Value is longer than ${this.maxlength} characters`);
    }
    this.value = value;
    this.updateState();
  }

  public onChange(handler: (value: string) => void | Promise<void>): void {
    this.context.addHandler(this.widgetId, 'change', () => handler(this.getValue()));
  }
}
