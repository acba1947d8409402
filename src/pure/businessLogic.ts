/**
 * PURE BUSINESS LOGIC
 *
 * Catalogue construction and sales aggregation. These functions take the
 * parsed JSON documents and return values plus the warnings for every
 * record they had to skip. Nothing here prints or touches the filesystem.
 *
 * Amounts are plain floating point numbers; rounding only happens when the
 * report is formatted.
 */

import {Catalogue, LineItem, SaleId} from '../domain';
import {
  AggregationResult,
  CatalogueResult,
  JsonObject,
  ParseFailure,
  ProductRejection,
  ProductSkipped,
  SaleLineRejection,
  SaleLineSkipped,
} from './types';
import {Either, Just, Left, Maybe, Nothing, Right} from 'purify-ts';

export const DATE_NOT_AVAILABLE = 'N/A';

const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

// ============================================================================
// Field Access & Parsing
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a field of a raw record. `null` reads as absent, and so does every
 * field of a record that is not a JSON object.
 */
export function readField(record: unknown, key: string): unknown {
  if (!isJsonObject(record) || !Object.prototype.hasOwnProperty.call(record, key)) {
    return undefined;
  }
  return record[key] ?? undefined;
}

function present(value: unknown): Maybe<unknown> {
  return value === undefined ? Nothing : Just(value);
}

function nonEmptyString(value: unknown): Maybe<string> {
  return typeof value === 'string' && value.length > 0 ? Just(value) : Nothing;
}

function toSaleId(value: unknown): Maybe<SaleId> {
  return typeof value === 'string' || typeof value === 'number' ? Just(value) : Nothing;
}

export function parsePrice(value: unknown): Either<ParseFailure, number> {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Right(value) : Left('out_of_range');
  }
  if (typeof value !== 'string') {
    return Left('wrong_type');
  }
  const text = value.trim();
  if (!FLOAT_LITERAL.test(text)) {
    return Left('malformed');
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? Right(parsed) : Left('out_of_range');
}

/**
 * Numbers are truncated toward zero; strings must be an optionally signed
 * run of digits. Either way the result must be a safe integer.
 */
export function parseQuantity(value: unknown): Either<ParseFailure, number> {
  if (typeof value === 'number') {
    const truncated = Math.trunc(value);
    return Number.isSafeInteger(truncated) ? Right(truncated) : Left('out_of_range');
  }
  if (typeof value !== 'string') {
    return Left('wrong_type');
  }
  const text = value.trim();
  if (!INTEGER_LITERAL.test(text)) {
    return Left('malformed');
  }
  const parsed = Number.parseInt(text, 10);
  return Number.isSafeInteger(parsed) ? Right(parsed) : Left('out_of_range');
}

export function saleDate(value: unknown): string {
  if (value === undefined) return DATE_NOT_AVAILABLE;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// ============================================================================
// Catalogue
// ============================================================================

export type PricedProduct = {
  readonly title: string;
  readonly price: number;
};

export function validateProduct(record: unknown, index: number): Either<ProductSkipped, PricedProduct> {
  const rawTitle = readField(record, 'title');
  const rawPrice = readField(record, 'price');
  const skip = (
    reason: ProductRejection,
    title: string | null,
    value: unknown,
    cause?: ParseFailure
  ): ProductSkipped => ({
    type: 'product_skipped',
    index,
    title,
    reason,
    value,
    cause,
  });

  return nonEmptyString(rawTitle)
    .toEither(skip('missing_title', null, rawTitle))
    .chain(title => present(rawPrice)
      .toEither(skip('missing_price', title, rawPrice))
      .chain(price => parsePrice(price).mapLeft(cause => skip('invalid_price', title, price, cause)))
      .chain((price): Either<ProductSkipped, number> =>
        price < 0 ? Left(skip('negative_price', title, price)) : Right(price))
      .map(price => ({title, price})));
}

/**
 * Later records with the same title replace earlier ones without a warning.
 */
export function buildCatalogue(products: readonly unknown[]): CatalogueResult {
  const validated = products.map((record, index) => validateProduct(record, index));

  return {
    catalogue: new Map(Either.rights(validated).map((p): [string, number] => [p.title, p.price])),
    warnings: Either.lefts(validated),
  };
}

// ============================================================================
// Sales Aggregation
// ============================================================================

export type PricedLine = {
  readonly saleId: SaleId;
  readonly date: string;
  readonly item: LineItem;
};

export function validateSaleLine(
  catalogue: Catalogue,
  record: unknown,
  index: number
): Either<SaleLineSkipped, PricedLine> {
  const rawSaleId = readField(record, 'SALE_ID');
  const rawProduct = readField(record, 'Product');
  const rawQuantity = readField(record, 'Quantity');
  const skip = (
    reason: SaleLineRejection,
    saleId: SaleId | null,
    product: string | null,
    value: unknown,
    cause?: ParseFailure
  ): SaleLineSkipped => ({
    type: 'sale_line_skipped',
    index,
    saleId,
    product,
    reason,
    value,
    cause,
  });

  return present(rawSaleId)
    .toEither(skip('missing_sale_id', null, null, rawSaleId))
    .chain(id => toSaleId(id).toEither(skip('invalid_sale_id', null, null, id)))
    .chain(saleId => nonEmptyString(rawProduct)
      .toEither(skip('missing_product', saleId, null, rawProduct))
      .chain(product => parseQuantity(rawQuantity)
        .mapLeft(cause => skip('invalid_quantity', saleId, product, rawQuantity, cause))
        .chain(quantity => Maybe.fromNullable(catalogue.get(product))
          .toEither(skip('unknown_product', saleId, product, product))
          .map(unitPrice => ({
            saleId,
            date: saleDate(readField(record, 'SALE_Date')),
            item: {product, quantity, unitPrice, lineTotal: unitPrice * quantity},
          })))));
}

type OpenSale = {
  readonly saleId: SaleId;
  readonly date: string;
  readonly items: LineItem[];
  total: number;
};

/**
 * Group valid sale lines by SALE_ID. A sale keeps the date of its first
 * valid line; items stay in input order.
 */
export function aggregateSales(catalogue: Catalogue, records: readonly unknown[]): AggregationResult {
  const sales = new Map<SaleId, OpenSale>();
  const warnings: SaleLineSkipped[] = [];
  let grandTotal = 0;

  records.forEach((record, index) => {
    validateSaleLine(catalogue, record, index).caseOf({
      Left: warning => {
        warnings.push(warning);
      },
      Right: ({saleId, date, item}) => {
        const sale: OpenSale = sales.get(saleId) ?? {saleId, date, items: [], total: 0};
        sale.items.push(item);
        sale.total += item.lineTotal;
        sales.set(saleId, sale);
        grandTotal += item.lineTotal;
      },
    });
  });

  return {summary: {sales, grandTotal}, warnings};
}
