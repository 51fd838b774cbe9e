import { ChartWidget, Figure, MarkdownWidget, NotificationWidget } from '../visualization/widgets';
import { DetectionVisMetric, formatMetric, formatText, MatchType, round2 } from './baseVisMetric';

/**
 * Recall section of a detection report: explanation, headline number and
 * per-class bar chart.
 */
export class Recall extends DetectionVisMetric {
  static readonly MARKDOWN = 'recall';
  static readonly MARKDOWN_PER_CLASS = 'recall_per_class';
  static readonly NOTIFICATION = 'recall';
  static readonly CHART = 'recall';

  protected readonly clickMatchTypes: readonly MatchType[] = ['TP', 'FN'];
  clickable = true;

  public get md(): MarkdownWidget {
    return new MarkdownWidget(Recall.MARKDOWN, 'Recall', this.visTexts.markdown_R);
  }

  public get notification(): NotificationWidget {
    const { description } = this.visTexts.notification_recall;
    const mp = this.evalResult.mp;
    const recall = round2(mp.baseMetrics().recall);
    let iouText: string;
    if (mp.averageAcrossIouThresholds) {
      iouText = '[0.5,0.55,...,0.95]';
    } else if (mp.iouThresholdPerClass !== undefined) {
      iouText = 'custom';
    } else {
      iouText = formatMetric(mp.iouThreshold);
    }
    return new NotificationWidget(
      Recall.NOTIFICATION,
      `Recall (IoU=${iouText}) = ${formatMetric(recall)}`,
      formatText(description, mp.tpCount, mp.tpCount + mp.fnCount)
    );
  }

  public get perClassMd(): MarkdownWidget {
    const text = formatText(this.visTexts.markdown_R_perclass, this.visTexts.definitions.f1_score);
    return new MarkdownWidget(Recall.MARKDOWN_PER_CLASS, 'Recall per class', text);
  }

  public get chart(): ChartWidget {
    const chart = new ChartWidget(Recall.CHART, this.getFigure());
    chart.setClickData(
      this.exploreModalTableId,
      this.getClickData(),
      "'getKey': (payload) => `${payload.points[0].label}`,"
    );
    return chart;
  }

  /**
   * Bar per class, sorted by ascending f1. Bars carry their value as a label
   * when there are at most 20 classes; fewer than 10 get a fixed width.
   */
  public getFigure(): Figure {
    const sorted = [...this.evalResult.mp.perClassMetrics()].sort((a, b) => a.f1 - b.f1);
    const recalls = sorted.map((item) => item.recall);
    const figure: Figure = {
      data: [
        {
          type: 'bar',
          x: sorted.map((item) => item.category),
          y: recalls,
          marker: { color: recalls, colorscale: 'Plasma', cmin: 0, cmax: 1 },
          hovertemplate: 'Class: %{x}<br>Recall: %{y:.2f}<extra></extra>'
        }
      ],
      layout: {
        xaxis: { title: { text: 'Class' } },
        yaxis: { title: { text: 'Recall' }, range: [0, 1] }
      }
    };
    if (sorted.length <= 20) {
      figure.data[0].text = recalls.map((recall) => String(round2(recall)));
      figure.data[0].textposition = 'outside';
    }
    if (sorted.length < 10) {
      figure.layout.width = 700;
    }
    return figure;
  }
}
