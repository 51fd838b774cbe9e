import { isJsonObject, JsonObject, JsonSerializable, JsonValue } from '../io/json';

export type TagValueType = 'none' | 'any_number' | 'any_string' | 'oneof_string';

export type TagValue = string | number | null;

const TAG_VALUE_TYPES: readonly TagValueType[] = ['none', 'any_number', 'any_string', 'oneof_string'];

function isTagValueType(value: unknown): value is TagValueType {
  return TAG_VALUE_TYPES.some((type) => type === value);
}

/**
 * Definition of a tag in a project meta: its name, the kind of value it
 * takes and, for `oneof_string`, the allowed values.
 */
export class TagMeta implements JsonSerializable {
  readonly name: string;
  readonly valueType: TagValueType;
  readonly possibleValues: string[];
  readonly color: string;
  /** platform id, known once the meta has been stored on the server */
  readonly id?: number;

  constructor(
    name: string,
    valueType: TagValueType = 'none',
    possibleValues: string[] = [],
    color = '#8A0F59',
    id?: number
  ) {
    if (valueType === 'oneof_string' && possibleValues.length === 0) {
      throw new Error(`Tag "${name}" of type oneof_string needs a list of possible values`);
    }
    if (valueType !== 'oneof_string' && possibleValues.length > 0) {
      throw new Error(`Tag "${name}" of type ${valueType} cannot have possible values`);
    }
    this.name = name;
    this.valueType = valueType;
    this.possibleValues = possibleValues;
    this.color = color;
    this.id = id;
  }

  /**
   * Checks that a value fits this tag's value type.
   */
  public isValidValue(value: TagValue): boolean {
    switch (this.valueType) {
      case 'none':
        return value === null;
      case 'any_number':
        return typeof value === 'number';
      case 'any_string':
        return typeof value === 'string';
      case 'oneof_string':
        return typeof value === 'string' && this.possibleValues.includes(value);
    }
  }

  public toJson(): JsonObject {
    const output: JsonObject = {
      name: this.name,
      value_type: this.valueType,
      color: this.color
    };
    if (this.valueType === 'oneof_string') {
      output.values = this.possibleValues;
    }
    if (this.id !== undefined) {
      output.id = this.id;
    }
    return output;
  }

  static fromJson(data: JsonObject): TagMeta {
    const { name, value_type: valueType, values, color, id } = data;
    if (typeof name !== 'string') {
      throw new Error('Tag meta must have a string "name"');
    }
    if (!isTagValueType(valueType)) {
      throw new Error(`Tag meta "${name}" has unknown value_type ${JSON.stringify(valueType)}`);
    }
    const possibleValues = Array.isArray(values)
      ? values.filter((value): value is string => typeof value === 'string')
      : [];
    return new TagMeta(
      name,
      valueType,
      possibleValues,
      typeof color === 'string' ? color : undefined,
      typeof id === 'number' ? id : undefined
    );
  }
}

/**
 * A tag put on a video, optionally limited to a range of frames.
 */
export class VideoTag implements JsonSerializable {
  readonly meta: TagMeta;
  readonly value: TagValue;
  readonly frameRange?: [number, number];

  constructor(meta: TagMeta, value: TagValue = null, frameRange?: [number, number]) {
    if (!meta.isValidValue(value)) {
      throw new Error(`Value ${JSON.stringify(value)} is not valid for tag "${meta.name}"`);
    }
    if (frameRange !== undefined && (frameRange[0] < 0 || frameRange[1] < frameRange[0])) {
      throw new RangeError(`Invalid frame range [${frameRange[0]}, ${frameRange[1]}]`);
    }
    this.meta = meta;
    this.value = value;
    this.frameRange = frameRange;
  }

  public get name(): string {
    return this.meta.name;
  }

  public toJson(): JsonObject {
    const output: JsonObject = { name: this.meta.name };
    if (this.value !== null) {
      output.value = this.value;
    }
    if (this.frameRange !== undefined) {
      output.frameRange = [this.frameRange[0], this.frameRange[1]];
    }
    return output;
  }
}

export class TagCollection<T extends JsonSerializable = VideoTag> implements Iterable<T> {
  private readonly items: T[];

  constructor(items: T[] = []) {
    this.items = [...items];
  }

  public get length(): number {
    return this.items.length;
  }

  public [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  public toArray(): T[] {
    return [...this.items];
  }

  public toJson(): JsonValue[] {
    return this.items.map((item) => item.toJson());
  }
}

export function parseTagMetas(value: JsonValue | undefined): TagMeta[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isJsonObject).map((item) => TagMeta.fromJson(item));
}
