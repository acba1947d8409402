/**
 * One-line, human-readable renderings of warning events and fatal errors.
 */

import {DocumentKind, FatalError, ParseFailure, ProductSkipped, SaleLineSkipped, Warning} from './types';

const documentLabels: Record<DocumentKind, string> = {
  catalogue: 'Product catalogue',
  sales: 'Sales record',
};

const priceFailureNotes: Record<ParseFailure, string> = {
  wrong_type: 'not a number',
  malformed: 'not a decimal number',
  out_of_range: 'out of range',
};

const quantityFailureNotes: Record<ParseFailure, string> = {
  wrong_type: 'not a number',
  malformed: 'not a whole number',
  out_of_range: 'out of range',
};

function display(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// Present but unusable: anything other than absent or the empty string
function isInvalidValue(value: unknown): boolean {
  return value !== undefined && value !== '';
}

function noteFor(notes: Record<ParseFailure, string>, cause: ParseFailure | undefined): string {
  return cause ? ` (${notes[cause]})` : '';
}

function describeProductSkipped(warning: ProductSkipped): string {
  const subject = `Product '${warning.title}' at index ${warning.index}`;
  switch (warning.reason) {
    case 'missing_title':
      return isInvalidValue(warning.value)
        ? `Warning: Product at index ${warning.index} has invalid title ${display(warning.value)}, skipping.`
        : `Warning: Product at index ${warning.index} has no title, skipping.`;
    case 'missing_price':
      return `Warning: ${subject} has no price, skipping.`;
    case 'invalid_price':
      return `Warning: ${subject} has invalid price '${display(warning.value)}'`
        + `${noteFor(priceFailureNotes, warning.cause)}, skipping.`;
    case 'negative_price':
      return `Warning: ${subject} has negative price ${display(warning.value)}, skipping.`;
  }
}

function describeSaleLineSkipped(warning: SaleLineSkipped): string {
  const subject = `Record at index ${warning.index} (Sale ${warning.saleId})`;
  switch (warning.reason) {
    case 'missing_sale_id':
      return `Warning: Record at index ${warning.index} has no SALE_ID, skipping.`;
    case 'invalid_sale_id':
      return `Warning: Record at index ${warning.index} has invalid SALE_ID ${display(warning.value)}, skipping.`;
    case 'missing_product':
      return isInvalidValue(warning.value)
        ? `Warning: ${subject} has invalid Product ${display(warning.value)}, skipping.`
        : `Warning: ${subject} has no Product, skipping.`;
    case 'invalid_quantity':
      return warning.value === undefined
        ? `Warning: ${subject} has no Quantity, skipping.`
        : `Warning: ${subject} has invalid Quantity '${display(warning.value)}'`
          + `${noteFor(quantityFailureNotes, warning.cause)}, skipping.`;
    case 'unknown_product':
      return `Warning: Product '${warning.product}' not found in catalogue, `
        + `skipping record at index ${warning.index} (Sale ${warning.saleId}).`;
  }
}

export function describeWarning(warning: Warning): string {
  return warning.type === 'product_skipped'
    ? describeProductSkipped(warning)
    : describeSaleLineSkipped(warning);
}

export function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function isPermissionError(error: Error): boolean {
  const code = errorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

export function describeWriteFailure(path: string, error: Error): string {
  return isPermissionError(error)
    ? `Error: Permission denied writing to '${path}'.`
    : `Error: Could not write to '${path}': ${error.message}`;
}

export function describeFatalError(error: FatalError): string {
  switch (error.type) {
    case 'document_not_found':
      return `Error: File '${error.path}' not found.`;
    case 'permission_denied':
      return `Error: Permission denied reading '${error.path}'.`;
    case 'unreadable_document':
      return `Error: Could not read '${error.path}': ${error.cause}`;
    case 'invalid_json':
      return `Error: File '${error.path}' contains invalid JSON: ${error.cause}`;
    case 'not_an_array':
      return `Error: ${documentLabels[error.document]} '${error.path}' must be a JSON array.`;
    case 'empty_catalogue':
      return 'Error: No valid products found in catalogue.';
  }
}
