/**
 * Sales Module REST Routes
 *
 * - GET  /api/v1/sales/overview: columns, counts and filter options
 * - GET  /api/v1/sales/summary:  KPIs, monthly series and rankings
 * - GET  /api/v1/sales/clusters: revenue grouped by rounded coordinates
 * - GET  /api/v1/sales/export:   filtered records as `;`-delimited text
 * - POST /api/v1/sales/reload:   re-read the source file
 */

import { err, type Result } from 'neverthrow';

import {
  ErrorResponseSchema,
  SalesClustersQuerySchema,
  SalesClustersResponseSchema,
  SalesFilterQuerySchema,
  SalesOverviewResponseSchema,
  SalesReloadResponseSchema,
  SalesSummaryQuerySchema,
  SalesSummaryResponseSchema,
  type SalesClustersQuery,
  type SalesFilterQuery,
  type SalesSummaryQuery,
} from './schemas.js';
import { getHttpStatusForError, type SalesError } from '../../core/errors.js';
import { buildSalesFilters } from '../../core/usecases/build-sales-filters.js';
import { filterSalesRecords } from '../../core/usecases/filter-sales-records.js';
import {
  countInvalidDates,
  describeFilterOptions,
  summarizeSales,
} from '../../core/usecases/summarize-sales.js';
import { exportSalesCsv } from '../repo/sales-csv-writer.js';

import type { SalesStore } from '../../core/ports.js';
import type { NormalizedSalesTable, RevenueField } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeSalesRoutesDeps {
  store: SalesStore;
  defaults: {
    revenueField: RevenueField;
    geoClusterPrecision: number;
  };
}

export const EXPORT_FILE_NAME = 'ventas_filtradas.csv';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: SalesError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

interface FilteredView {
  loaded: NormalizedSalesTable;
  filtered: NormalizedSalesTable;
}

/**
 * Resolves the canonical table and a filtered copy of it.
 */
const selectFiltered = (
  store: SalesStore,
  query: SalesFilterQuery
): Result<FilteredView, SalesError> => {
  const current = store.current();
  if (current.isErr()) return err(current.error);

  const loaded = current.value;
  return buildSalesFilters(query)
    .andThen((filters) => filterSalesRecords(loaded, filters))
    .map((filtered) => ({ loaded, filtered }));
};

const pickFilters = (query: SalesSummaryQuery | SalesClustersQuery): SalesFilterQuery => {
  const { dateFrom, dateTo, includeInvalidDates, category, product, client, city, zone } = query;
  return {
    ...(dateFrom !== undefined && { dateFrom }),
    ...(dateTo !== undefined && { dateTo }),
    ...(includeInvalidDates !== undefined && { includeInvalidDates }),
    ...(category !== undefined && { category }),
    ...(product !== undefined && { product }),
    ...(client !== undefined && { client }),
    ...(city !== undefined && { city }),
    ...(zone !== undefined && { zone }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeSalesRoutes = (deps: MakeSalesRoutesDeps): FastifyPluginAsync => {
  const { store, defaults } = deps;

  return async (fastify) => {
    fastify.get(
      '/api/v1/sales/overview',
      {
        schema: {
          response: {
            200: SalesOverviewResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const current = store.current();
        if (current.isErr()) {
          return sendError(reply, current.error);
        }

        const table = current.value;
        return reply.status(200).send({
          ok: true,
          data: {
            columns: table.columns,
            recordCount: table.records.length,
            invalidDateCount: countInvalidDates(table),
            filterOptions: describeFilterOptions(table),
          },
        });
      }
    );

    fastify.get<{ Querystring: SalesSummaryQuery }>(
      '/api/v1/sales/summary',
      {
        schema: {
          querystring: SalesSummaryQuerySchema,
          response: {
            200: SalesSummaryResponseSchema,
            400: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const view = selectFiltered(store, pickFilters(request.query));
        if (view.isErr()) {
          return sendError(reply, view.error);
        }

        const { loaded, filtered } = view.value;
        const revenueField = request.query.revenueField ?? defaults.revenueField;

        return reply.status(200).send({
          ok: true,
          data: {
            recordCount: filtered.records.length,
            invalidDateCount: countInvalidDates(loaded),
            summary: summarizeSales(filtered, revenueField),
          },
        });
      }
    );

    fastify.get<{ Querystring: SalesClustersQuery }>(
      '/api/v1/sales/clusters',
      {
        schema: {
          querystring: SalesClustersQuerySchema,
          response: {
            200: SalesClustersResponseSchema,
            400: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const view = selectFiltered(store, pickFilters(request.query));
        if (view.isErr()) {
          return sendError(reply, view.error);
        }

        const precision = request.query.precision ?? defaults.geoClusterPrecision;
        const revenueField = request.query.revenueField ?? defaults.revenueField;

        return reply.status(200).send({
          ok: true,
          data: {
            precision,
            revenueField,
            clusters: store.clusters(view.value.filtered, precision, revenueField),
          },
        });
      }
    );

    fastify.get<{ Querystring: SalesFilterQuery }>(
      '/api/v1/sales/export',
      {
        schema: {
          querystring: SalesFilterQuerySchema,
          response: {
            400: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const view = selectFiltered(store, request.query);
        if (view.isErr()) {
          return sendError(reply, view.error);
        }

        return reply
          .status(200)
          .header('content-type', 'text/csv; charset=utf-8')
          .header('content-disposition', `attachment; filename="${EXPORT_FILE_NAME}"`)
          .send(exportSalesCsv(view.value.filtered));
      }
    );

    fastify.post(
      '/api/v1/sales/reload',
      {
        schema: {
          response: {
            200: SalesReloadResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await store.load();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
