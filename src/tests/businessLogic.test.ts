/**
 * TESTS FOR PURE BUSINESS LOGIC
 *
 * Plain inputs and outputs: no effects to fake.
 */

import {Catalogue} from '../domain';
import {
  aggregateSales,
  buildCatalogue,
  DATE_NOT_AVAILABLE,
  parsePrice,
  parseQuantity,
  readField,
  saleDate,
} from '../pure/businessLogic';


describe('readField', () => {
  it('reads a present field', () => {
    expect(readField({title: 'Pen'}, 'title')).toBe('Pen');
  });

  it('treats null as absent', () => {
    expect(readField({title: null}, 'title')).toBeUndefined();
  });

  it('keeps falsy values that are present', () => {
    expect(readField({SALE_ID: 0}, 'SALE_ID')).toBe(0);
    expect(readField({SALE_ID: ''}, 'SALE_ID')).toBe('');
  });

  it('finds no fields on non-object records', () => {
    expect(readField(['title'], '0')).toBeUndefined();
    expect(readField('Pen', 'title')).toBeUndefined();
    expect(readField(null, 'title')).toBeUndefined();
  });

  it('ignores inherited properties', () => {
    expect(readField({}, 'toString')).toBeUndefined();
  });
});

describe('parsePrice', () => {
  it('accepts finite numbers', () => {
    expect(parsePrice(1.5).extract()).toBe(1.5);
    expect(parsePrice(0).extract()).toBe(0);
    expect(parsePrice(-3).extract()).toBe(-3);
  });

  it('parses numeric strings', () => {
    expect(parsePrice(' 2.50 ').extract()).toBe(2.5);
    expect(parsePrice('1e3').extract()).toBe(1000);
    expect(parsePrice('.5').extract()).toBe(0.5);
    expect(parsePrice('7.').extract()).toBe(7);
  });

  it('rejects malformed strings', () => {
    const result = parsePrice('cheap');
    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toBe('malformed');
    expect(parsePrice('').extract()).toBe('malformed');
    expect(parsePrice('1.2.3').extract()).toBe('malformed');
  });

  it('rejects values of the wrong type', () => {
    expect(parsePrice(true).extract()).toBe('wrong_type');
    expect(parsePrice({amount: 1}).extract()).toBe('wrong_type');
    expect(parsePrice(null).extract()).toBe('wrong_type');
  });

  it('rejects values that overflow', () => {
    expect(parsePrice('1e400').extract()).toBe('out_of_range');
  });
});

describe('parseQuantity', () => {
  it('accepts integers and integer strings', () => {
    expect(parseQuantity(3).extract()).toBe(3);
    expect(parseQuantity('3').extract()).toBe(3);
    expect(parseQuantity(' -7 ').extract()).toBe(-7);
  });

  it('truncates fractional numbers toward zero', () => {
    expect(parseQuantity(3.9).extract()).toBe(3);
    expect(parseQuantity(-2.5).extract()).toBe(-2);
  });

  it('rejects strings that are not integers', () => {
    expect(parseQuantity('abc').extract()).toBe('malformed');
    expect(parseQuantity('3.5').extract()).toBe('malformed');
    expect(parseQuantity('').extract()).toBe('malformed');
  });

  it('rejects missing and non-numeric values', () => {
    expect(parseQuantity(undefined).extract()).toBe('wrong_type');
    expect(parseQuantity(true).extract()).toBe('wrong_type');
  });

  it('rejects integers beyond the safe range', () => {
    expect(parseQuantity('99999999999999999999').extract()).toBe('out_of_range');
    expect(parseQuantity(1e300).extract()).toBe('out_of_range');
    expect(parseQuantity(Number.MAX_SAFE_INTEGER).extract()).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe('saleDate', () => {
  it('keeps string dates as they are', () => {
    expect(saleDate('01/01/2024')).toBe('01/01/2024');
  });

  it('falls back when the date is absent', () => {
    expect(saleDate(undefined)).toBe(DATE_NOT_AVAILABLE);
    expect(DATE_NOT_AVAILABLE).toBe('N/A');
  });

  it('stringifies other values', () => {
    expect(saleDate(20240101)).toBe('20240101');
  });
});

describe('buildCatalogue', () => {
  it('maps titles to prices and skips invalid products in order', () => {
    const {catalogue, warnings} = buildCatalogue([
      {title: 'Pen', price: 1.5},
      {title: '', price: 2},
      {price: 3},
      {title: 'Ink'},
      {title: 'Pad', price: 'cheap'},
      {title: 'Gum', price: -1},
      {title: 'Clip', price: '0.25'},
      {title: 'Free', price: 0},
    ]);

    expect([...catalogue.entries()]).toEqual([
      ['Pen', 1.5],
      ['Clip', 0.25],
      ['Free', 0],
    ]);
    expect(warnings).toEqual([
      {type: 'product_skipped', index: 1, title: null, reason: 'missing_title', value: ''},
      {type: 'product_skipped', index: 2, title: null, reason: 'missing_title', value: undefined},
      {type: 'product_skipped', index: 3, title: 'Ink', reason: 'missing_price', value: undefined},
      {type: 'product_skipped', index: 4, title: 'Pad', reason: 'invalid_price', value: 'cheap', cause: 'malformed'},
      {type: 'product_skipped', index: 5, title: 'Gum', reason: 'negative_price', value: -1},
    ]);
  });

  it('lets later duplicates override earlier ones without a warning', () => {
    const {catalogue, warnings} = buildCatalogue([
      {title: 'Pen', price: 1.5},
      {title: 'Pen', price: 2},
    ]);

    expect(catalogue.get('Pen')).toBe(2);
    expect(catalogue.size).toBe(1);
    expect(warnings).toHaveLength(0);
  });

  it('records why a price could not be parsed', () => {
    const {warnings} = buildCatalogue([
      {title: 'Yacht', price: '1e400'},
      {title: 'Flag', price: true},
      {title: 'Pad', price: 'x'},
    ]);

    expect(warnings.map(w => [w.reason, w.cause])).toEqual([
      ['invalid_price', 'out_of_range'],
      ['invalid_price', 'wrong_type'],
      ['invalid_price', 'malformed'],
    ]);
  });

  it('keeps a non-string title on the warning', () => {
    const {catalogue, warnings} = buildCatalogue([{title: 5, price: 1}]);

    expect(catalogue.size).toBe(0);
    expect(warnings).toEqual([
      {type: 'product_skipped', index: 0, title: null, reason: 'missing_title', value: 5},
    ]);
  });

  it('treats a null price as missing', () => {
    const {warnings} = buildCatalogue([{title: 'Pen', price: null}]);
    expect(warnings[0]?.reason).toBe('missing_price');
  });

  it('skips records that are not objects', () => {
    const {catalogue, warnings} = buildCatalogue([42, 'Pen']);

    expect(catalogue.size).toBe(0);
    expect(warnings.map(w => w.reason)).toEqual(['missing_title', 'missing_title']);
  });

  it('returns an empty catalogue for an empty list', () => {
    const {catalogue, warnings} = buildCatalogue([]);
    expect(catalogue.size).toBe(0);
    expect(warnings).toEqual([]);
  });
});

describe('aggregateSales', () => {
  const catalogue: Catalogue = new Map([
    ['Pen', 1.5],
    ['Ink', 4],
    ['Free', 0],
  ]);

  const records = [
    {SALE_ID: 1, Product: 'Pen', Quantity: 4, SALE_Date: '01/01/2024'},
    {Product: 'Pen', Quantity: 1},
    {SALE_ID: null, Product: 'Pen', Quantity: 1},
    {SALE_ID: {id: 3}, Product: 'Pen', Quantity: 1},
    {SALE_ID: 2, Product: '', Quantity: 1},
    {SALE_ID: 2, Product: 'Pen', Quantity: 'abc'},
    {SALE_ID: 2, Product: 'Pencil', Quantity: 2},
    {SALE_ID: 1, Product: 'Ink', Quantity: '3', SALE_Date: '02/01/2024'},
    {SALE_ID: 0, Product: 'Free', Quantity: 5},
  ];

  it('groups valid lines by sale and totals them', () => {
    const {summary} = aggregateSales(catalogue, records);

    expect([...summary.sales.keys()]).toEqual([1, 0]);
    expect(summary.sales.get(1)).toEqual({
      saleId: 1,
      date: '01/01/2024',
      items: [
        {product: 'Pen', quantity: 4, unitPrice: 1.5, lineTotal: 6},
        {product: 'Ink', quantity: 3, unitPrice: 4, lineTotal: 12},
      ],
      total: 18,
    });
    expect(summary.sales.get(0)).toEqual({
      saleId: 0,
      date: 'N/A',
      items: [{product: 'Free', quantity: 5, unitPrice: 0, lineTotal: 0}],
      total: 0,
    });
    expect(summary.grandTotal).toBe(18);
  });

  it('reports one warning per skipped line, in input order', () => {
    const {warnings} = aggregateSales(catalogue, records);

    expect(warnings).toEqual([
      {type: 'sale_line_skipped', index: 1, saleId: null, product: null, reason: 'missing_sale_id', value: undefined},
      {type: 'sale_line_skipped', index: 2, saleId: null, product: null, reason: 'missing_sale_id', value: undefined},
      {type: 'sale_line_skipped', index: 3, saleId: null, product: null, reason: 'invalid_sale_id', value: {id: 3}},
      {type: 'sale_line_skipped', index: 4, saleId: 2, product: null, reason: 'missing_product', value: ''},
      {
        type: 'sale_line_skipped',
        index: 5,
        saleId: 2,
        product: 'Pen',
        reason: 'invalid_quantity',
        value: 'abc',
        cause: 'malformed',
      },
      {type: 'sale_line_skipped', index: 6, saleId: 2, product: 'Pencil', reason: 'unknown_product', value: 'Pencil'},
    ]);
  });

  it('prices a single line', () => {
    const {summary, warnings} = aggregateSales(
      new Map([['Pen', 1.5]]),
      [{SALE_ID: 1, Product: 'Pen', Quantity: 4}]
    );

    expect(summary.grandTotal).toBe(6);
    expect(warnings).toEqual([]);
  });

  it('creates no sale when every line is unknown', () => {
    const {summary, warnings} = aggregateSales(
      new Map([['Pen', 1.5]]),
      [{SALE_ID: 1, Product: 'Pencil', Quantity: 2}]
    );

    expect(summary.grandTotal).toBe(0);
    expect(summary.sales.size).toBe(0);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({reason: 'unknown_product', product: 'Pencil'});
  });

  it('rejects huge quantities however they are spelled', () => {
    const {summary, warnings} = aggregateSales(catalogue, [
      {SALE_ID: 1, Product: 'Pen', Quantity: 1e300},
      {SALE_ID: 1, Product: 'Pen', Quantity: '1' + '0'.repeat(300)},
      {SALE_ID: 1, Product: 'Pen', Quantity: true},
    ]);

    expect(summary.sales.size).toBe(0);
    expect(warnings.map(w => [w.reason, w.cause])).toEqual([
      ['invalid_quantity', 'out_of_range'],
      ['invalid_quantity', 'out_of_range'],
      ['invalid_quantity', 'wrong_type'],
    ]);
  });

  it('keeps the first date seen for a sale', () => {
    const {summary} = aggregateSales(catalogue, [
      {SALE_ID: 'A', Product: 'Pen', Quantity: 1},
      {SALE_ID: 'A', Product: 'Ink', Quantity: 1, SALE_Date: '05/05/2024'},
    ]);

    expect(summary.sales.get('A')?.date).toBe('N/A');
  });

  it('keeps numeric and string ids apart', () => {
    const {summary} = aggregateSales(catalogue, [
      {SALE_ID: 1, Product: 'Pen', Quantity: 1},
      {SALE_ID: '1', Product: 'Pen', Quantity: 1},
    ]);

    expect(summary.sales.size).toBe(2);
  });

  it('skips lines for products whose price was rejected', () => {
    const {catalogue: priced} = buildCatalogue([
      {title: 'Pen', price: 1.5},
      {title: 'Gum', price: -1},
    ]);
    const {summary, warnings} = aggregateSales(priced, [
      {SALE_ID: 1, Product: 'Gum', Quantity: 2},
    ]);

    expect(summary.sales.size).toBe(0);
    expect(warnings.map(w => w.reason)).toEqual(['unknown_product']);
  });

  it('does not round while accumulating', () => {
    const {summary} = aggregateSales(new Map([['Stamp', 0.1]]), [
      {SALE_ID: 1, Product: 'Stamp', Quantity: 1},
      {SALE_ID: 1, Product: 'Stamp', Quantity: 1},
      {SALE_ID: 2, Product: 'Stamp', Quantity: 1},
    ]);

    expect(summary.sales.get(1)?.total).toBe(0.1 + 0.1);
    expect(summary.grandTotal).toBe(0.1 + 0.1 + 0.1);
  });

  it('keeps every sale total equal to the sum of its items', () => {
    const {summary} = aggregateSales(catalogue, records);
    const totals = [...summary.sales.values()];

    totals.forEach(sale => {
      expect(sale.total).toBe(sale.items.reduce((sum, item) => sum + item.lineTotal, 0));
    });
    expect(summary.grandTotal).toBe(totals.reduce((sum, sale) => sum + sale.total, 0));
  });

  it('returns the same result when run twice', () => {
    expect(aggregateSales(catalogue, records)).toEqual(aggregateSales(catalogue, records));
  });
});
