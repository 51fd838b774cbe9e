export type ClassCounts = {
  category: string;
  TP: number;
  FP: number;
  FN: number;
};

export type BaseMetrics = {
  precision: number;
  recall: number;
  f1: number;
};

export type ClassMetrics = ClassCounts & BaseMetrics;

export type IouSettings = {
  iouThreshold: number;
  /** metrics are averaged over IoU 0.5:0.05:0.95 */
  averageAcrossIouThresholds?: boolean;
  /** category -> IoU threshold, when thresholds differ per class */
  iouThresholdPerClass?: Record<string, number>;
};

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function metricsOf(tp: number, fp: number, fn: number): BaseMetrics {
  const precision = ratio(tp, tp + fp);
  const recall = ratio(tp, tp + fn);
  return { precision, recall, f1: ratio(2 * precision * recall, precision + recall) };
}

/**
 * Detection metrics computed from per-class match counts.
 */
export class MetricProvider {
  readonly counts: ClassCounts[];
  readonly iouThreshold: number;
  readonly averageAcrossIouThresholds: boolean;
  readonly iouThresholdPerClass?: Record<string, number>;

  constructor(counts: ClassCounts[], settings: IouSettings = { iouThreshold: 0.5 }) {
    for (const item of counts) {
      if (item.TP < 0 || item.FP < 0 || item.FN < 0) {
        throw new RangeError(`Negative count for class "${item.category}"`);
      }
    }
    this.counts = counts;
    this.iouThreshold = settings.iouThreshold;
    this.averageAcrossIouThresholds = settings.averageAcrossIouThresholds ?? false;
    this.iouThresholdPerClass = settings.iouThresholdPerClass;
  }

  public get tpCount(): number {
    return this.counts.reduce((sum, item) => sum + item.TP, 0);
  }

  public get fpCount(): number {
    return this.counts.reduce((sum, item) => sum + item.FP, 0);
  }

  public get fnCount(): number {
    return this.counts.reduce((sum, item) => sum + item.FN, 0);
  }

  /** Micro-averaged precision, recall and f1 over all classes. */
  public baseMetrics(): BaseMetrics {
    return metricsOf(this.tpCount, this.fpCount, this.fnCount);
  }

  public perClassMetrics(): ClassMetrics[] {
    return this.counts.map((item) => ({ ...item, ...metricsOf(item.TP, item.FP, item.FN) }));
  }
}
