import { MetricProvider } from '../src/nn/benchmark/MetricProvider';
import {
  defaultVisTexts,
  formatMetric,
  formatText,
  Match,
  round2
} from '../src/nn/benchmark/object_detection/baseVisMetric';
import { Recall } from '../src/nn/benchmark/object_detection/Recall';

const counts = [
  { category: 'cat', TP: 8, FP: 2, FN: 2 },
  { category: 'dog', TP: 1, FP: 0, FN: 3 },
  { category: 'bird', TP: 0, FP: 1, FN: 0 }
];

const matches: Match[] = [
  { category: 'cat', imageId: 1, type: 'TP' },
  { category: 'cat', imageId: 1, type: 'FN' },
  { category: 'cat', imageId: 2, type: 'FP' },
  { category: 'dog', imageId: 3, type: 'FN' }
];

test('metric provider totals and per-class metrics', () => {
  const mp = new MetricProvider(counts);

  expect([mp.tpCount, mp.fpCount, mp.fnCount]).toEqual([9, 3, 5]);
  const base = mp.baseMetrics();
  expect(base.precision).toBeCloseTo(0.75);
  expect(base.recall).toBeCloseTo(9 / 14);
  const perClass = mp.perClassMetrics();
  expect(perClass.map((item) => item.recall)).toEqual([0.8, 0.25, 0]);
  expect(perClass[1].f1).toBeCloseTo(0.4);
  expect(perClass[2]).toEqual({ category: 'bird', TP: 0, FP: 1, FN: 0, precision: 0, recall: 0, f1: 0 });
  expect(() => new MetricProvider([{ category: 'x', TP: -1, FP: 0, FN: 0 }])).toThrow(
    'Negative count for class "x"'
  );
});

test('formatText fills placeholders in order', () => {
  expect(formatText('{} of {}', 3, 4)).toBe('3 of 4');
  expect(formatText('{} of {}', 3)).toBe('3 of {}');
});

test('report numbers round ties to even and keep a decimal on whole values', () => {
  expect(round2(0.125)).toBe(0.12);
  expect(round2(0.375)).toBe(0.38);
  expect(round2(9 / 14)).toBe(0.64);
  expect(formatMetric(1)).toBe('1.0');
  expect(formatMetric(0)).toBe('0.0');
  expect(formatMetric(0.25)).toBe('0.25');
});

function classes(count: number) {
  return Array.from({ length: count }, (_, index) => ({
    category: `c${index}`,
    TP: index,
    FP: 1,
    FN: 1
  }));
}

describe('recall', () => {
  test('notification names the IoU threshold', () => {
    const recall = new Recall({ mp: new MetricProvider(counts) }, 'explore-table');
    const json = recall.notification.toJson();

    expect(json).toEqual({
      type: 'notification',
      name: 'recall',
      title: 'Recall (IoU=0.5) = 0.64',
      description: 'The model correctly found <b>9 of 14</b> total instances in the dataset.'
    });
  });

  test('perfect recall is written with one decimal', () => {
    const mp = new MetricProvider([{ category: 'cat', TP: 4, FP: 0, FN: 0 }]);
    expect(new Recall({ mp }, 't').notification.title).toBe('Recall (IoU=0.5) = 1.0');
  });

  test('a recall of one eighth rounds down to the even digit', () => {
    const mp = new MetricProvider([{ category: 'cat', TP: 1, FP: 0, FN: 7 }]);
    const json = new Recall({ mp }, 't').notification.toJson();

    expect(json.title).toBe('Recall (IoU=0.5) = 0.12');
    expect(json.description).toBe(
      'The model correctly found <b>1 of 8</b> total instances in the dataset.'
    );
  });

  test('the title does not depend on the texts file', () => {
    const visTexts = {
      ...defaultVisTexts,
      notification_recall: { description: 'Gefunden: {} von {}' }
    };
    const notification = new Recall({ mp: new MetricProvider(counts) }, 't', visTexts).notification;

    expect(notification.title).toBe('Recall (IoU=0.5) = 0.64');
    expect(notification.description).toBe('Gefunden: 9 von 14');
  });

  test('averaged and per-class thresholds', () => {
    const averaged = new MetricProvider(counts, { iouThreshold: 0.5, averageAcrossIouThresholds: true });
    const custom = new MetricProvider(counts, {
      iouThreshold: 0.5,
      iouThresholdPerClass: { cat: 0.7, dog: 0.5, bird: 0.5 }
    });

    expect(new Recall({ mp: averaged }, 't').notification.title).toBe(
      'Recall (IoU=[0.5,0.55,...,0.95]) = 0.64'
    );
    expect(new Recall({ mp: custom }, 't').notification.title).toBe('Recall (IoU=custom) = 0.64');
  });

  test('markdown sections', () => {
    const recall = new Recall({ mp: new MetricProvider(counts) }, 't');

    expect(recall.md.title).toBe('Recall');
    expect(recall.perClassMd.toJson()).toEqual({
      type: 'markdown',
      name: 'recall_per_class',
      title: 'Recall per class',
      text:
        '### Recall per class\n\nEach bar is the recall of one class. Bars are sorted by the class F1-score. ' +
        'F1-score is the harmonic mean of precision and recall: it is high only when both are high.'
    });
  });

  test('chart bars are sorted by f1 with value labels', () => {
    const recall = new Recall({ mp: new MetricProvider(counts), matches }, 'explore-table');
    const figure = recall.getFigure();

    expect(figure.data[0].x).toEqual(['bird', 'dog', 'cat']);
    expect(figure.data[0].y).toEqual([0, 0.25, 0.8]);
    expect(figure.data[0].text).toEqual(['0', '0.25', '0.8']);
    expect(figure.data[0].textposition).toBe('outside');
    expect(figure.layout.width).toBe(700);
    expect(figure.layout.yaxis.range).toEqual([0, 1]);
  });

  test('twenty classes still get labels, ten no longer get a fixed width', () => {
    const twenty = new Recall({ mp: new MetricProvider(classes(20)) }, 't').getFigure();
    expect(twenty.data[0].text).toHaveLength(20);
    expect(twenty.data[0].textposition).toBe('outside');
    expect(twenty.layout.width).toBeUndefined();

    const ten = new Recall({ mp: new MetricProvider(classes(10)) }, 't').getFigure();
    expect(ten.data[0].text).toHaveLength(10);
    expect(ten.layout.width).toBeUndefined();

    const nine = new Recall({ mp: new MetricProvider(classes(9)) }, 't').getFigure();
    expect(nine.layout.width).toBe(700);
  });

  test('many classes get neither labels nor a fixed width', () => {
    const figure = new Recall({ mp: new MetricProvider(classes(21)) }, 't').getFigure();

    expect(figure.data[0].x).toHaveLength(21);
    expect(figure.data[0].text).toBeUndefined();
    expect(figure.layout.width).toBeUndefined();
  });

  test('clicking a class lists images with found or missed objects', () => {
    const recall = new Recall({ mp: new MetricProvider(counts), matches }, 'explore-table');
    const chart = recall.chart.toJson();

    expect(chart.clickData).toEqual({
      tableId: 'explore-table',
      data: {
        cat: { title: 'Class: cat', imagesIds: [1] },
        dog: { title: 'Class: dog', imagesIds: [3] }
      },
      chartClickExtra: "'getKey': (payload) => `${payload.points[0].label}`,"
    });
    expect(recall.clickable).toBe(true);
  });
});
