/**
 * Sales Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Source Columns
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Column names recognised in the sales export. All are optional in a file.
 */
export const SourceColumn = {
  SALE_DATE: 'FechaVta',
  UNITS: 'Unidades',
  REVENUE_INVOICED: 'VtaFacturada',
  COST: 'Costo',
  REVENUE_LINE: 'ValVentaLi',
  GEO: 'Georeferenciado',
  CLIENT: 'NombreComercial',
  PRODUCT: 'DescMaterial',
  CATEGORY: 'DescGrArticulo',
  CITY: 'Ciudad',
  ZONE: 'ZonaVenta',
} as const;

export type SourceColumn = (typeof SourceColumn)[keyof typeof SourceColumn];

/** Field delimiter of the sales export, used for reading and writing. */
export const SALES_DELIMITER = ';';

// ─────────────────────────────────────────────────────────────────────────────
// Raw Table
// ─────────────────────────────────────────────────────────────────────────────

export type RawSalesRow = Readonly<Record<string, string>>;

/**
 * A parsed export before normalization. Every cell is text.
 * Column names are already trimmed.
 */
export interface RawSalesTable {
  readonly columns: readonly string[];
  readonly rows: readonly RawSalesRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dimensions
// ─────────────────────────────────────────────────────────────────────────────

export type Dimension = 'client' | 'product' | 'category' | 'city' | 'zone';

export const DIMENSIONS: readonly Dimension[] = ['category', 'product', 'client', 'city', 'zone'];

export const DIMENSION_SOURCE: Readonly<Record<Dimension, SourceColumn>> = {
  client: SourceColumn.CLIENT,
  product: SourceColumn.PRODUCT,
  category: SourceColumn.CATEGORY,
  city: SourceColumn.CITY,
  zone: SourceColumn.ZONE,
};

// ─────────────────────────────────────────────────────────────────────────────
// Normalized Table
// ─────────────────────────────────────────────────────────────────────────────

/** Rounded `[latitude, longitude]` pair identifying a geographic bucket. */
export type ClusterKey = readonly [number, number];

/**
 * One transaction after type coercion and derived-field computation.
 *
 * Dimension aliases are only present as properties when the source has the
 * corresponding column; an empty cell in a present column is `null`.
 */
export interface NormalizedSalesRecord {
  readonly saleDate: Date | null;
  readonly saleDateRaw?: string | null;
  readonly dateValid: boolean;

  readonly units: number | null;
  readonly cost: number | null;

  readonly revenueInvoiced: number | null;
  readonly revenueLine: number | null;
  readonly revenueDefault: number | null;

  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly geoCluster: ClusterKey | null;

  readonly client?: string | null;
  readonly product?: string | null;
  readonly category?: string | null;
  readonly city?: string | null;
  readonly zone?: string | null;

  readonly margin: number | null;
  readonly marginPct: number | null;

  /** Raw cell values keyed by source column, for lossless export */
  readonly source: RawSalesRow;
}

export interface NormalizedSalesTable {
  /** Trimmed source header, in file order */
  readonly columns: readonly string[];
  readonly records: readonly NormalizedSalesRecord[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Revenue Field
// ─────────────────────────────────────────────────────────────────────────────

export const REVENUE_FIELDS = ['revenueInvoiced', 'revenueLine', 'revenueDefault'] as const;

export type RevenueField = (typeof REVENUE_FIELDS)[number];

export const isRevenueField = (value: string): value is RevenueField =>
  (REVENUE_FIELDS as readonly string[]).includes(value);

// ─────────────────────────────────────────────────────────────────────────────
// Geo Clusters
// ─────────────────────────────────────────────────────────────────────────────

export interface ClusterBucket {
  readonly cluster: ClusterKey;
  /** Centroid of the constituent coordinates, not the rounded key */
  readonly latitude: number;
  readonly longitude: number;
  readonly revenue: number;
  readonly count: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Filters
// ─────────────────────────────────────────────────────────────────────────────

export interface SalesFilters {
  /** Inclusive calendar day */
  dateFrom?: Date;
  /** Inclusive calendar day */
  dateTo?: Date;
  /** Keep records whose sale date did not parse. Defaults to false. */
  includeInvalidDates?: boolean;
  category?: readonly string[];
  product?: readonly string[];
  client?: readonly string[];
  city?: readonly string[];
  zone?: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Summaries
// ─────────────────────────────────────────────────────────────────────────────

export interface SalesKpis {
  totalRevenue: number;
  totalUnits: number;
  recordCount: number;
  averageTicket: number;
}

export interface MonthlyRevenuePoint {
  /** `yyyy-MM` */
  month: string;
  revenue: number;
}

export interface DimensionTotal {
  value: string;
  revenue: number;
}

export interface ProductMargin {
  product: string;
  margin: number;
}

export interface MarginAnalysis {
  totalMargin: number;
  /** Share of revenue, 0 when there is no revenue */
  marginPct: number;
  topProducts: ProductMargin[];
}

export interface SalesSummary {
  revenueField: RevenueField;
  kpis: SalesKpis;
  monthly: MonthlyRevenuePoint[];
  topProducts: DimensionTotal[] | null;
  topClients: DimensionTotal[] | null;
  byCity: DimensionTotal[] | null;
  byZone: DimensionTotal[] | null;
  margin: MarginAnalysis | null;
}

export interface FilterOptions {
  dimensions: Partial<Record<Dimension, string[]>>;
  /** Earliest valid sale date, `yyyy-MM-dd` */
  minDate: string | null;
  /** Latest valid sale date, `yyyy-MM-dd` */
  maxDate: string | null;
}

export const TOP_PRODUCTS_LIMIT = 15;
export const TOP_CLIENTS_LIMIT = 15;
export const TOP_LOCATIONS_LIMIT = 20;
export const TOP_MARGIN_LIMIT = 15;
