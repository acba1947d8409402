// Module product types

import {Catalogue, SaleId, SalesSummary} from "../domain";

export type JsonObject = { readonly [key: string]: unknown };

export type ProductRejection = 'missing_title' | 'missing_price' | 'invalid_price' | 'negative_price';

export type SaleLineRejection =
    | 'missing_sale_id'
    | 'invalid_sale_id'
    | 'missing_product'
    | 'invalid_quantity'
    | 'unknown_product';

export type ProductSkipped = {
    readonly type: 'product_skipped';
    readonly index: number;
    readonly title: string | null;
    readonly reason: ProductRejection;
    readonly value: unknown;
    readonly cause?: ParseFailure;
};

export type SaleLineSkipped = {
    readonly type: 'sale_line_skipped';
    readonly index: number;
    readonly saleId: SaleId | null;
    readonly product: string | null;
    readonly reason: SaleLineRejection;
    readonly value: unknown;
    readonly cause?: ParseFailure;
};

export type Warning = ProductSkipped | SaleLineSkipped;

export type CatalogueResult = {
    readonly catalogue: Catalogue;
    readonly warnings: readonly ProductSkipped[];
};

export type AggregationResult = {
    readonly summary: SalesSummary;
    readonly warnings: readonly SaleLineSkipped[];
};

export type DocumentKind = 'catalogue' | 'sales';

export type FatalError =
    | { readonly type: 'document_not_found'; readonly path: string }
    | { readonly type: 'permission_denied'; readonly path: string }
    | { readonly type: 'unreadable_document'; readonly path: string; readonly cause: string }
    | { readonly type: 'invalid_json'; readonly path: string; readonly cause: string }
    | { readonly type: 'not_an_array'; readonly path: string; readonly document: DocumentKind }
    | { readonly type: 'empty_catalogue' };

export type ParseFailure = 'wrong_type' | 'malformed' | 'out_of_range';
