// Domain types shared across the application

export type SaleId = string | number;

export type Catalogue = ReadonlyMap<string, number>;

export type LineItem = {
  readonly product: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly lineTotal: number;
};

export type SaleAggregate = {
  readonly saleId: SaleId;
  readonly date: string;
  readonly items: readonly LineItem[];
  readonly total: number;
};

export type SalesSummary = {
  readonly sales: ReadonlyMap<SaleId, SaleAggregate>;
  readonly grandTotal: number;
};

export type ReportMode = 'total' | 'detail';
