import { describe, expect, it } from 'vitest';
import { createInventoryStore } from '../../inventory-store';
import { summarizeDataset, summarizeStore } from '../calculators/summary';
import { makeDataset } from './test-utils';

const spirits = makeDataset('spirits', [
  { Product: 'Gin', Value: 10.1, Margin: 0.2 },
  { Product: 'Rum', Value: 20.2, Margin: 0.25 },
  { Product: 'Rye', Value: 5, Margin: 0.3 }
]);

describe('summarizeDataset', () => {
  it('counts products, totals value and averages margin', () => {
    expect(summarizeDataset(spirits)).toEqual({
      category: 'spirits',
      productCount: 3,
      totalValue: 35.3,
      averageMargin: 0.25
    });
  });

  it('has no average margin for ingredients', () => {
    const ingredients = makeDataset('ingredients', [{ Product: 'Salt', Value: 2 }]);
    expect(summarizeDataset(ingredients).averageMargin).toBeNull();
  });

  it('summarizes an empty dataset as zeros', () => {
    expect(summarizeDataset(makeDataset('beer', []))).toEqual({
      category: 'beer',
      productCount: 0,
      totalValue: 0,
      averageMargin: null
    });
  });
});

describe('summarizeStore', () => {
  it('totals value across categories', () => {
    const store = createInventoryStore();
    store.datasets.spirits = spirits;
    store.datasets.wine = makeDataset('wine', [{ Product: 'Cava', Value: 14.7, Margin: 0.33 }]);

    const summary = summarizeStore(store);
    expect(summary.categories.wine.totalValue).toBe(14.7);
    expect(summary.categories.beer.productCount).toBe(0);
    expect(summary.grandTotalValue).toBe(50);
  });
});
