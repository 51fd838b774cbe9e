import { compare, Operation } from 'fast-json-patch';
import type { TaskApi } from '../../api/TaskApi';
import { isJsonObject, JsonObject, JsonValue } from '../../io/json';

export type WidgetHandler = (state: JsonObject) => void | Promise<void>;

/**
 * What the templating layer receives for one widget.
 */
export type WidgetJson = {
  widgetId: string;
  type: string;
  data: JsonObject;
  state: JsonObject;
  /** layout settings consumed by the template only */
  props: JsonObject;
  children: WidgetJson[];
};

function clone(value: JsonObject): JsonObject {
  return JSON.parse(JSON.stringify(value));
}

function operationToJson(operation: Operation): JsonObject {
  return JSON.parse(JSON.stringify(operation));
}

/**
 * Page-wide JSON document keyed by widget id. Tracks what was last sent to
 * the front end so only changes travel.
 */
export class JsonStore {
  private current: JsonObject = {};
  private sent: JsonObject = {};

  public get(widgetId: string): JsonObject | undefined {
    const value = this.current[widgetId];
    return isJsonObject(value) ? value : undefined;
  }

  public set(widgetId: string, value: JsonObject): void {
    this.current[widgetId] = clone(value);
  }

  /** Shallow-merges `patch` into the widget's entry. */
  public merge(widgetId: string, patch: JsonObject): void {
    this.current[widgetId] = { ...this.get(widgetId), ...clone(patch) };
  }

  /** JSON patch from the last sent document to the current one. */
  public diff(): JsonObject[] {
    return compare(this.sent, this.current).map(operationToJson);
  }

  /** Top-level entries that changed since the last send. */
  public changedEntries(): JsonObject {
    const changed: JsonObject = {};
    for (const [key, value] of Object.entries(this.current)) {
      if (JSON.stringify(value) !== JSON.stringify(this.sent[key])) {
        changed[key] = clone({ value }).value;
      }
    }
    return changed;
  }

  public markSent(): void {
    this.sent = clone(this.current);
  }
}

/**
 * Holds the data and state documents of one application page and the event
 * handlers of its widgets.
 */
export class WidgetContext {
  readonly dataJson = new JsonStore();
  readonly stateJson = new JsonStore();
  private readonly widgets = new Map<string, Widget>();
  private readonly handlers = new Map<string, WidgetHandler[]>();
  private readonly counters = new Map<string, number>();

  /** `Button_1`, `Button_2`, ... per widget type */
  public nextId(type: string): string {
    const next = (this.counters.get(type) ?? 0) + 1;
    this.counters.set(type, next);
    return `${type}_${next}`;
  }

  public register(widget: Widget): void {
    if (this.widgets.has(widget.widgetId)) {
      throw new Error(`Widget with id "${widget.widgetId}" already exists`);
    }
    this.widgets.set(widget.widgetId, widget);
  }

  public addHandler(widgetId: string, event: string, handler: WidgetHandler): void {
    const key = `${widgetId}/${event}`;
    this.handlers.set(key, [...(this.handlers.get(key) ?? []), handler]);
  }

  /**
   * Applies the state the front end sent with an event, then runs the
   * handlers registered for it.
   *
   * @param widgetId id of the widget the event comes from
   * @param event event name, e.g. `click`
   * @param state the page state at the time of the event
   *
   * @returns {Promise<number>} number of handlers run
   */
  public async dispatch(widgetId: string, event: string, state: JsonObject = {}): Promise<number> {
    const widget = this.widgets.get(widgetId);
    if (widget === undefined) {
      throw new Error(`Unknown widget "${widgetId}"`);
    }
    for (const [key, value] of Object.entries(state)) {
      if (isJsonObject(value) && this.widgets.has(key)) {
        this.stateJson.merge(key, value);
      }
    }
    const handlers = this.handlers.get(`${widgetId}/${event}`) ?? [];
    const widgetState = this.stateJson.get(widgetId) ?? {};
    for (const handler of handlers) {
      await handler(widgetState);
    }
    return handlers.length;
  }

  /**
   * Pushes what changed since the previous call to the application page.
   *
   * @param task task API of the connection
   * @param taskId id of the application task
   *
   * @returns {Promise<boolean>} `false` when there was nothing to send
   */
  public async sendChanges(task: TaskApi, taskId: number): Promise<boolean> {
    const dataPatch = this.dataJson.diff();
    const state = this.stateJson.changedEntries();
    if (dataPatch.length === 0 && Object.keys(state).length === 0) {
      return false;
    }
    await task.updateAppContent(taskId, dataPatch, state);
    this.dataJson.markSent();
    this.stateJson.markSent();
    return true;
  }
}

export const defaultContext = new WidgetContext();

export type WidgetOptions = {
  widgetId?: string;
  context?: WidgetContext;
};

/**
 * Base of every widget. A widget owns one entry in the page's data document
 * (what it displays) and one in the state document (what the user can
 * change), both keyed by its id.
 */
export abstract class Widget {
  readonly widgetId: string;
  readonly context: WidgetContext;

  constructor(options: WidgetOptions = {}) {
    this.context = options.context ?? defaultContext;
    this.widgetId = options.widgetId ?? this.context.nextId(this.constructor.name);
  }

  /**
   * Must be called by subclasses once their fields are set and checked:
   * JSON getters read them, and field initializers run after the base
   * constructor. A widget joins its context here, so one whose constructor
   * throws leaves no trace.
   */
  protected init(): void {
    this.context.register(this);
    this.context.dataJson.set(this.widgetId, this.getJsonData());
    this.context.stateJson.set(this.widgetId, this.getJsonState());
  }

  public abstract getJsonData(): JsonObject;

  public abstract getJsonState(): JsonObject;

  /** Settings the template needs that the front-end component does not. */
  protected getTemplateProps(): JsonObject {
    return {};
  }

  protected getChildren(): Widget[] {
    return [];
  }

  /** Rewrites the widget's data entry from its fields. */
  public updateData(): void {
    this.context.dataJson.set(this.widgetId, this.getJsonData());
  }

  /** Rewrites the widget's state entry from its fields. */
  public updateState(): void {
    this.context.stateJson.set(this.widgetId, this.getJsonState());
  }

  /** Current state as last set by the server or sent by the front end. */
  protected currentState(): JsonObject {
    return this.context.stateJson.get(this.widgetId) ?? this.getJsonState();
  }

  protected stateValue(key: string): JsonValue | undefined {
    return this.currentState()[key];
  }

  public toJson(): WidgetJson {
    return {
      widgetId: this.widgetId,
      type: this.constructor.name,
      data: this.context.dataJson.get(this.widgetId) ?? this.getJsonData(),
      state: this.currentState(),
      props: this.getTemplateProps(),
      children: this.getChildren().map((child) => child.toJson())
    };
  }
}
