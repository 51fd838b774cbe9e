import { JsonObject, JsonSerializable, JsonValue } from '../../../io/json';

/**
 * Static report widgets. Unlike application widgets they do not hold state:
 * the report is rendered once from their JSON.
 */
export abstract class BaseVisWidget implements JsonSerializable {
  readonly name: string;
  readonly title?: string;

  constructor(name: string, title?: string) {
    this.name = name;
    this.title = title;
  }

  public abstract toJson(): JsonObject;
}

export class MarkdownWidget extends BaseVisWidget {
  readonly text: string;

  constructor(name: string, title: string, text: string) {
    super(name, title);
    this.text = text;
  }

  public toJson(): JsonObject {
    return { type: 'markdown', name: this.name, title: this.title ?? null, text: this.text };
  }
}

export class NotificationWidget extends BaseVisWidget {
  readonly description: string;

  constructor(name: string, title: string, description: string) {
    super(name, title);
    this.description = description;
  }

  public toJson(): JsonObject {
    return {
      type: 'notification',
      name: this.name,
      title: this.title ?? null,
      description: this.description
    };
  }
}

export type BarTrace = {
  type: 'bar';
  x: string[];
  y: number[];
  marker: { color: number[]; colorscale: string; cmin: number; cmax: number };
  hovertemplate: string;
  text?: string[];
  textposition?: 'outside';
};

export type Figure = {
  data: BarTrace[];
  layout: {
    xaxis: { title: { text: string } };
    yaxis: { title: { text: string }; range?: [number, number] };
    width?: number;
  };
};

export type ClickData = Record<string, { title: string; imagesIds: number[] }>;

/**
 * A chart, and optionally what clicking one of its bars opens in the
 * explore table.
 */
export class ChartWidget extends BaseVisWidget {
  readonly figure: Figure;
  private clickData?: { tableId: string; data: ClickData; chartClickExtra: string };

  constructor(name: string, figure: Figure) {
    super(name);
    this.figure = figure;
  }

  /**
   * @param tableId id of the explore table widget that shows clicked items
   * @param data per-key items to show
   * @param chartClickExtra front-end snippet that maps a click payload to a key
   */
  public setClickData(tableId: string, data: ClickData, chartClickExtra = ''): void {
    this.clickData = { tableId, data, chartClickExtra };
  }

  public toJson(): JsonObject {
    const figure: JsonValue = JSON.parse(JSON.stringify(this.figure));
    const output: JsonObject = { type: 'chart', name: this.name, figure };
    if (this.clickData !== undefined) {
      output.clickData = {
        tableId: this.clickData.tableId,
        data: JSON.parse(JSON.stringify(this.clickData.data)),
        chartClickExtra: this.clickData.chartClickExtra
      };
    }
    return output;
  }
}
