import {
  computeSuccessRate,
  hasPopulatedField,
  isPopulated,
} from './success-rate';

describe('computeSuccessRate', () => {
  const hasPrice = (hotel: { price: number }) => hotel.price > 0;

  it('divides usable entities by attempted ones', () => {
    const hotels = [{ price: 120 }, { price: 0 }, { price: 90 }, { price: 0 }];
    expect(computeSuccessRate(hotels, 4, hasPrice)).toBe(0.5);
  });

  it('counts attempts that yielded nothing against the rate', () => {
    expect(computeSuccessRate([{ price: 100 }], 4, hasPrice)).toBe(0.25);
  });

  it('is zero when nothing was attempted', () => {
    expect(computeSuccessRate([], 0, hasPrice)).toBe(0);
  });
});

describe('isPopulated', () => {
  it.each([
    [undefined, false],
    [null, false],
    ['  ', false],
    [0, false],
    [Number.NaN, false],
    [[], false],
    ['Marina Walk', true],
    [4.5, true],
    [['Pool'], true],
    [{}, true],
  ])('%p -> %p', (value, expected) => {
    expect(isPopulated(value)).toBe(expected);
  });

  it('checks any of the given fields', () => {
    const record = { address: '', rating: 8.1 };
    expect(hasPopulatedField(record, ['address', 'rating'])).toBe(true);
    expect(hasPopulatedField(record, ['address'])).toBe(false);
  });
});
