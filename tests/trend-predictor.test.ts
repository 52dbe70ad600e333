import { TrendPredictor, toFeatureVector } from '../src/field-health/trend-predictor';
import { makeBundle, makeSample, testLogger } from './helpers/fixtures';

function history(count: number, ndvi: (index: number) => number) {
  return Array.from({ length: count }, (_, index) =>
    makeSample('field-1', `2026-03-${String(index + 1).padStart(2, '0')}`, {
      ndviMean: ndvi(index),
      tempMean: 18 + index,
      rainfallTotal: index % 3,
      humidityMean: 50 + 2 * index,
      soilMoistureEst: 0.3 + index / 100,
    })
  );
}

describe('TrendPredictor', () => {
  it('builds features in a fixed order', () => {
    expect(toFeatureVector(makeSample('f', '2026-03-01'))).toEqual([24, 3, 55, 2.5, 0.4]);
  });

  it('passes the NDVI mean through with fewer than five samples', () => {
    const predictor = new TrendPredictor(testLogger());

    expect(predictor.retrain('field-1', history(4, () => 0.8))).toBe(false);
    expect(predictor.isTrained('field-1')).toBe(false);
    expect(predictor.predict('field-1', makeBundle({ ndviMean: 0.63 }))).toBe(0.63);
  });

  it('clamps predictions to the upper bound', () => {
    const predictor = new TrendPredictor(testLogger());

    expect(predictor.retrain('field-1', history(5, () => 0.99))).toBe(true);
    expect(predictor.predict('field-1', makeBundle())).toBe(0.95);
  });

  it('clamps predictions to the lower bound', () => {
    const predictor = new TrendPredictor(testLogger());

    predictor.retrain('field-1', history(6, () => 0.02));
    expect(predictor.predict('field-1', makeBundle())).toBe(0.1);
  });

  it('keeps the previous model when new history is too short', () => {
    const predictor = new TrendPredictor(testLogger());
    predictor.retrain('field-1', history(5, () => 0.99));

    expect(predictor.retrain('field-1', history(2, () => 0.2))).toBe(false);
    expect(predictor.isTrained('field-1')).toBe(true);
    expect(predictor.predict('field-1', makeBundle())).toBe(0.95);
  });

  it('ignores samples with non-finite values', () => {
    const predictor = new TrendPredictor(testLogger());
    const samples = history(5, () => 0.6);
    samples[2] = { ...samples[2], tempMean: Number.NaN };

    expect(predictor.retrain('field-1', samples)).toBe(false);
  });

  it('keeps models per field and forgets on request', () => {
    const predictor = new TrendPredictor(testLogger());
    predictor.retrain('field-1', history(5, () => 0.99));

    expect(predictor.predict('field-2', makeBundle({ ndviMean: 0.44 }))).toBe(0.44);

    predictor.forget('field-1');
    expect(predictor.predict('field-1', makeBundle({ ndviMean: 0.44 }))).toBe(0.44);
  });

  it('gives identical predictions for identical history', () => {
    const samples = history(8, index => 0.4 + index * 0.05);
    const first = new TrendPredictor(testLogger());
    const second = new TrendPredictor(testLogger());
    first.retrain('field-1', samples);
    second.retrain('field-1', samples);

    const bundle = makeBundle({ tempMean: 21, humidityMean: 57 });
    const prediction = first.predict('field-1', bundle);
    expect(second.predict('field-1', bundle)).toBe(prediction);
    expect(prediction).toBeGreaterThanOrEqual(0.1);
    expect(prediction).toBeLessThanOrEqual(0.95);
  });
});
