/**
 * REPORT FORMATTING
 *
 * Renders a sales summary as the fixed-width text report. Pure: the same
 * summary, elapsed time and mode always give the same text.
 */

import {LineItem, ReportMode, SaleAggregate, SaleId, SalesSummary} from '../domain';

export const REPORT_TITLE = '**** SALES REPORT ****';

const RULE_WIDTH = 60;
const PRODUCT_WIDTH = 35;
const QUANTITY_WIDTH = 4;
const UNIT_PRICE_WIDTH = 9;
const LINE_TOTAL_WIDTH = 10;
// Product, quantity and unit price columns plus the spaces between them
const SUBTOTAL_LABEL_WIDTH = 50;

// Ties on the exact binary value round away from zero (0.125 -> 0.13)
const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: false,
});

const grandTotalFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true,
});

/**
 * Numeric ids sort numerically and before string ids; string ids sort by
 * code unit.
 */
export function compareSaleIds(a: SaleId, b: SaleId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function formatMoney(amount: number): string {
  return moneyFormat.format(amount);
}

export function formatGrandTotal(amount: number): string {
  return grandTotalFormat.format(amount);
}

function row(product: string, quantity: string, unitPrice: string, lineTotal: string): string {
  return `  ${product.padEnd(PRODUCT_WIDTH)} ${quantity.padStart(QUANTITY_WIDTH)} `
    + `${unitPrice.padStart(UNIT_PRICE_WIDTH)} ${lineTotal.padStart(LINE_TOTAL_WIDTH)}`;
}

function itemRow(item: LineItem): string {
  return row(item.product, String(item.quantity), formatMoney(item.unitPrice), formatMoney(item.lineTotal));
}

export function formatSale(sale: SaleAggregate): string[] {
  return [
    `Sale ID: ${sale.saleId}  |  Date: ${sale.date}`,
    '-'.repeat(RULE_WIDTH),
    row('Product', 'Qty', 'Unit $', 'Total $'),
    row(
      '-'.repeat(PRODUCT_WIDTH),
      '-'.repeat(QUANTITY_WIDTH),
      '-'.repeat(UNIT_PRICE_WIDTH),
      '-'.repeat(LINE_TOTAL_WIDTH)
    ),
    ...sale.items.map(itemRow),
    `  ${''.padStart(SUBTOTAL_LABEL_WIDTH)} ${'-'.repeat(LINE_TOTAL_WIDTH)}`,
    `  ${'Sale Total'.padStart(SUBTOTAL_LABEL_WIDTH)} ${formatMoney(sale.total).padStart(LINE_TOTAL_WIDTH)}`,
    '',
  ];
}

export function formatReport(summary: SalesSummary, elapsedSeconds: number, mode: ReportMode): string {
  const separator = '='.repeat(RULE_WIDTH);
  const details = mode === 'detail'
    ? [...summary.sales.values()]
      .sort((a, b) => compareSaleIds(a.saleId, b.saleId))
      .flatMap(formatSale)
    : [];

  return [
    REPORT_TITLE,
    '',
    ...details,
    separator,
    `  GRAND TOTAL: $${formatGrandTotal(summary.grandTotal)}`,
    separator,
    `  Time elapsed: ${elapsedSeconds.toFixed(4)} seconds`,
    separator,
  ].join('\n');
}
