/**
 * Sales Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const DAY_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

/** Bounds of the `precision` query parameter */
export const MIN_HTTP_PRECISION = -6;
export const MAX_HTTP_PRECISION = 12;

export const RevenueFieldSchema = Type.Union([
  Type.Literal('revenueInvoiced'),
  Type.Literal('revenueLine'),
  Type.Literal('revenueDefault'),
]);

const filterProperties = {
  dateFrom: Type.Optional(Type.String({ pattern: DAY_PATTERN, description: 'First day, inclusive' })),
  dateTo: Type.Optional(Type.String({ pattern: DAY_PATTERN, description: 'Last day, inclusive' })),
  includeInvalidDates: Type.Optional(
    Type.Boolean({ description: 'Keep records whose FechaVta did not parse' })
  ),
  category: Type.Optional(Type.Array(Type.String())),
  product: Type.Optional(Type.Array(Type.String())),
  client: Type.Optional(Type.Array(Type.String())),
  city: Type.Optional(Type.Array(Type.String())),
  zone: Type.Optional(Type.Array(Type.String())),
};

export const SalesFilterQuerySchema = Type.Object(filterProperties, { additionalProperties: false });

export type SalesFilterQuery = Static<typeof SalesFilterQuerySchema>;

export const SalesSummaryQuerySchema = Type.Object(
  {
    ...filterProperties,
    revenueField: Type.Optional(RevenueFieldSchema),
  },
  { additionalProperties: false }
);

export type SalesSummaryQuery = Static<typeof SalesSummaryQuerySchema>;

export const SalesClustersQuerySchema = Type.Object(
  {
    ...filterProperties,
    revenueField: Type.Optional(RevenueFieldSchema),
    precision: Type.Optional(
      Type.Integer({
        minimum: MIN_HTTP_PRECISION,
        maximum: MAX_HTTP_PRECISION,
        description: 'Decimal digits used to round coordinates into clusters',
      })
    ),
  },
  { additionalProperties: false }
);

export type SalesClustersQuery = Static<typeof SalesClustersQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

const DimensionTotalSchema = Type.Object({
  value: Type.String(),
  revenue: Type.Number(),
});

const DimensionTotalsSchema = Type.Union([Type.Array(DimensionTotalSchema), Type.Null()]);

export const SalesOverviewResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    columns: Type.Array(Type.String()),
    recordCount: Type.Integer(),
    invalidDateCount: Type.Integer(),
    filterOptions: Type.Object({
      dimensions: Type.Object({
        category: Type.Optional(Type.Array(Type.String())),
        product: Type.Optional(Type.Array(Type.String())),
        client: Type.Optional(Type.Array(Type.String())),
        city: Type.Optional(Type.Array(Type.String())),
        zone: Type.Optional(Type.Array(Type.String())),
      }),
      minDate: NullableString,
      maxDate: NullableString,
    }),
  }),
});

export const SalesSummaryResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    recordCount: Type.Integer({ description: 'Records left after filtering' }),
    invalidDateCount: Type.Integer({ description: 'Invalid-date records in the loaded file' }),
    summary: Type.Object({
      revenueField: RevenueFieldSchema,
      kpis: Type.Object({
        totalRevenue: Type.Number(),
        totalUnits: Type.Number(),
        recordCount: Type.Integer(),
        averageTicket: Type.Number(),
      }),
      monthly: Type.Array(Type.Object({ month: Type.String(), revenue: Type.Number() })),
      topProducts: DimensionTotalsSchema,
      topClients: DimensionTotalsSchema,
      byCity: DimensionTotalsSchema,
      byZone: DimensionTotalsSchema,
      margin: Type.Union([
        Type.Object({
          totalMargin: Type.Number(),
          marginPct: Type.Number(),
          topProducts: Type.Array(Type.Object({ product: Type.String(), margin: Type.Number() })),
        }),
        Type.Null(),
      ]),
    }),
  }),
});

export const SalesClustersResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    precision: Type.Integer(),
    revenueField: RevenueFieldSchema,
    clusters: Type.Array(
      Type.Object({
        cluster: Type.Tuple([Type.Number(), Type.Number()]),
        latitude: Type.Number(),
        longitude: Type.Number(),
        revenue: Type.Number(),
        count: Type.Integer(),
      })
    ),
  }),
});

export const SalesReloadResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    recordCount: Type.Integer(),
    invalidDateCount: Type.Integer(),
    columns: Type.Array(Type.String()),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
