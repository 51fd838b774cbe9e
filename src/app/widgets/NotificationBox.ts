import { JsonObject } from '../../io/json';
import { Widget, WidgetOptions } from './Widget';

export type BoxType = 'success' | 'info' | 'warning' | 'error';

const BOX_ICONS: Record<BoxType, string> = {
  success: 'zmdi zmdi-check-circle',
  info: 'zmdi zmdi-info',
  warning: 'zmdi zmdi-alert-triangle',
  error: 'zmdi zmdi-alert-octagon'
};

export class NotificationBox extends Widget {
  private title?: string;
  private description?: string;
  private readonly boxType: BoxType;

  constructor(
    title?: string,
    description?: string,
    boxType: BoxType = 'info',
    options: WidgetOptions = {}
  ) {
    super(options);
    this.title = title;
    this.description = description;
    this.boxType = boxType;
    this.init();
  }

  public getJsonData(): JsonObject {
    return {
      title: this.title ?? null,
      description: this.description ?? null,
      icon: BOX_ICONS[this.boxType],
      box_type: this.boxType
    };
  }

  public getJsonState(): JsonObject {
    return {};
  }

  public setText(title?: string, description?: string): void {
    this.title = title;
    this.description = description;
    this.updateData();
  }
}
