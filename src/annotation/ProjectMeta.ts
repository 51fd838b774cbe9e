import { isJsonObject, JsonObject, JsonSerializable } from '../io/json';
import { parseTagMetas, TagMeta } from './tags';

/**
 * Object class of a project: what a labeled shape represents.
 */
export type ObjClass = {
  title: string;
  shape: string;
  color: string;
  id?: number;
};

/**
 * Classes and tag definitions of a project, as returned by `projects.meta`.
 */
export class ProjectMeta implements JsonSerializable {
  readonly objClasses: ObjClass[];
  readonly tagMetas: TagMeta[];

  constructor(objClasses: ObjClass[] = [], tagMetas: TagMeta[] = []) {
    this.objClasses = objClasses;
    this.tagMetas = tagMetas;
  }

  public getTagMeta(name: string): TagMeta | null {
    return this.tagMetas.find((meta) => meta.name === name) ?? null;
  }

  public getObjClass(title: string): ObjClass | null {
    return this.objClasses.find((objClass) => objClass.title === title) ?? null;
  }

  public toJson(): JsonObject {
    return {
      classes: this.objClasses.map((objClass) => {
        const output: JsonObject = {
          title: objClass.title,
          shape: objClass.shape,
          color: objClass.color
        };
        if (objClass.id !== undefined) {
          output.id = objClass.id;
        }
        return output;
      }),
      tags: this.tagMetas.map((meta) => meta.toJson())
    };
  }

  static fromJson(data: JsonObject): ProjectMeta {
    const classes = Array.isArray(data.classes) ? data.classes.filter(isJsonObject) : [];
    const objClasses = classes.map((item): ObjClass => {
      const { title, shape, color, id } = item;
      if (typeof title !== 'string' || typeof shape !== 'string') {
        throw new Error('Object class must have string "title" and "shape"');
      }
      return {
        title,
        shape,
        color: typeof color === 'string' ? color : '#000000',
        id: typeof id === 'number' ? id : undefined
      };
    });
    return new ProjectMeta(objClasses, parseTagMetas(data.tags));
  }
}
