import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type TextStatus = 'text' | 'info' | 'success' | 'warning' | 'error';

const STATUS_ICONS: Record<TextStatus, string | null> = {
  text: null,
  info: 'zmdi zmdi-info',
  success: 'zmdi zmdi-check',
  warning: 'zmdi zmdi-alert-triangle',
  error: 'zmdi zmdi-close'
};

export class Text extends Widget {
  private text: string;
  private status: TextStatus;

  constructor(text = '', status: TextStatus = 'text', options: WidgetOptions = {}) {
    super(options);
    this.text = text;
    this.status = status;
    this.init();
  }

  public getJsonData(): JsonObject {
    return { status: this.status, icon: STATUS_ICONS[this.status] };
  }

  public getJsonState(): JsonObject {
    return { text: this.text };
  }

  public getText(): string {
    return this.text;
  }

  public setText(text: string, status?: TextStatus): void {
    this.text = text;
    this.updateState();
    if (status !== undefined && status !== this.status) {
      this.status = status;
      this.updateData();
    }
  }
}
