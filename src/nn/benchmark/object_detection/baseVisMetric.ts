import { MetricProvider } from '../MetricProvider';
import { ClickData } from '../visualization/widgets';
import visTextsJson from './vis_texts.json';

export type VisTexts = typeof visTextsJson;

export const defaultVisTexts: VisTexts = visTextsJson;

export type MatchType = 'TP' | 'FP' | 'FN';

export type Match = {
  category: string;
  imageId: number;
  type: MatchType;
};

export type EvalResult = {
  mp: MetricProvider;
  matches?: Match[];
};

/**
 * Fills `{}` placeholders in order, as the texts file writes them.
 *
 * @example
 * formatText('{} of {}', 3, 4); // '3 of 4'
 */
export function formatText(template: string, ...args: Array<string | number>): string {
  let index = 0;
  return template.replace(/\{\}/g, (placeholder) => {
    if (index >= args.length) {
      return placeholder;
    }
    return String(args[index++]);
  });
}

/**
 * Rounds to two decimals, the precision reports show. Ties go to the even
 * digit: `round2(0.125)` is `0.12`.
 */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const rounded = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded / 100;
}

/**
 * Writes a metric value the way report titles show it: whole numbers keep
 * one decimal.
 *
 * @example
 * formatMetric(1); // '1.0'
 * formatMetric(0.64); // '0.64'
 */
export function formatMetric(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * One section of an object-detection evaluation report.
 */
export abstract class DetectionVisMetric {
  readonly evalResult: EvalResult;
  readonly visTexts: VisTexts;
  readonly exploreModalTableId: string;
  clickable = false;

  constructor(evalResult: EvalResult, exploreModalTableId: string, visTexts: VisTexts = defaultVisTexts) {
    this.evalResult = evalResult;
    this.exploreModalTableId = exploreModalTableId;
    this.visTexts = visTexts;
  }

  /** Match types a click on a class shows; subclasses pick theirs. */
  protected abstract readonly clickMatchTypes: readonly MatchType[];

  /**
   * Images to show when a class is clicked: those holding a match of one
   * of `clickMatchTypes` for that class.
   */
  public getClickData(): ClickData {
    const data: ClickData = {};
    for (const match of this.evalResult.matches ?? []) {
      if (!this.clickMatchTypes.includes(match.type)) {
        continue;
      }
      const entry = (data[match.category] ??= { title: `Class: ${match.category}`, imagesIds: [] });
      if (!entry.imagesIds.includes(match.imageId)) {
        entry.imagesIds.push(match.imageId);
      }
    }
    return data;
  }
}
