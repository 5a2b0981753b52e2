import { beforeEach, describe, expect, it } from 'vitest';
import { createInventoryStore, type InventoryStore } from '../../inventory-store';
import { availableProducts, calculateRecipeCost, getProductCost } from '../calculators/product-cost';
import { makeDataset } from './test-utils';

let store: InventoryStore;

beforeEach(() => {
  store = createInventoryStore();
  store.datasets.spirits = makeDataset('spirits', [{ Product: 'House Vodka', 'Cost/Oz': 0.7874 }]);
  store.datasets.ingredients = makeDataset('ingredients', [
    { Product: 'Lime Juice', 'Cost/Unit': 0.25 },
    { Product: 'House Vodka', 'Cost/Unit': 9 }
  ]);
});

describe('getProductCost', () => {
  it('prefers spirits and matches names case-insensitively', () => {
    const cost = getProductCost(store, 'house vodka', 1.5);
    expect(cost.source).toBe('spirits');
    expect(cost.costPerUnit).toBe(0.7874);
    expect(cost.totalCost).toBeCloseTo(1.1811, 10);
  });

  it('falls back to ingredients', () => {
    expect(getProductCost(store, ' Lime Juice ', 2)).toEqual({ costPerUnit: 0.25, totalCost: 0.5, source: 'ingredients' });
  });

  it('skips a category without its unit cost column', () => {
    store.datasets.spirits = makeDataset('spirits', [{ Product: 'House Vodka', Cost: 20 }]);
    expect(getProductCost(store, 'House Vodka').source).toBe('ingredients');
  });

  it('costs unknown products at 0', () => {
    expect(getProductCost(store, 'Absinthe', 3)).toEqual({ costPerUnit: 0, totalCost: 0, source: null });
    expect(getProductCost(store, '   ')).toEqual({ costPerUnit: 0, totalCost: 0, source: null });
  });
});

describe('calculateRecipeCost', () => {
  it('sums ingredient costs and rounds to cents', () => {
    const total = calculateRecipeCost(store, [
      { product: 'House Vodka', amount: 2 },
      { product: 'Lime Juice', amount: 1 }
    ]);
    expect(total).toBe(1.82);
  });
});

describe('availableProducts', () => {
  it('lists distinct product names in order', () => {
    expect(availableProducts(store)).toEqual(['House Vodka', 'Lime Juice']);
  });
});
