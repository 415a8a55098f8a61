/**
 * Store statistics, computed by walking every document page.
 */

import type { FileSearchBackend } from "../backend/types.js";
import { checkPageSize, DEFAULT_PAGE_SIZE, paginate } from "../pagination.js";
import { toDocument, toStore } from "./convert.js";
import type { DocumentCounts, DocumentState } from "./model.js";
import { assertResourceName } from "./names.js";

export interface StatisticsOptions {
  pageSize?: number;
  /** Also fetch the store and compare its reported counts with the tally. */
  verifyCounts?: boolean;
}

export interface StoreStatistics {
  store_name: string;
  document_count: number;
  total_size_bytes: number;
  /** Only states that were observed appear. */
  states_breakdown: Partial<Record<DocumentState, number>>;
  pages: number;
  reported_counts?: DocumentCounts;
  counts_consistent?: boolean;
}

export async function getStoreStatistics(
  backend: FileSearchBackend,
  storeName: string,
  options: StatisticsOptions = {},
): Promise<StoreStatistics> {
  assertResourceName(storeName, "store_name");
  checkPageSize(options.pageSize);

  const stats: StoreStatistics = {
    store_name: storeName,
    document_count: 0,
    total_size_bytes: 0,
    states_breakdown: {},
    pages: 0,
  };

  const documents = paginate(
    (pageSize, pageToken) => backend.listDocuments(storeName, pageSize, pageToken),
    {
      pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
      onPage: (pageIndex) => {
        stats.pages = pageIndex;
      },
    },
  );

  for await (const view of documents) {
    const document = toDocument(view);
    stats.document_count++;
    stats.total_size_bytes += document.size_bytes ?? 0;
    stats.states_breakdown[document.state] = (stats.states_breakdown[document.state] ?? 0) + 1;
  }

  if (options.verifyCounts) {
    const reported = toStore(await backend.getStore(storeName)).counts;
    stats.reported_counts = reported;
    stats.counts_consistent =
      reported.total === stats.document_count
      && reported.active === (stats.states_breakdown.ACTIVE ?? 0)
      && reported.processing === (stats.states_breakdown.PROCESSING ?? 0)
      && reported.failed === (stats.states_breakdown.FAILED ?? 0);
    if (!stats.counts_consistent) {
      console.warn(
        `[statistics] ${storeName} reports ${reported.total} documents but listing found ${stats.document_count}`,
      );
    }
  }

  console.log(
    `[statistics] ${storeName}: ${stats.document_count} documents, ` +
    `${stats.total_size_bytes} bytes over ${stats.pages} page(s)`,
  );
  return stats;
}
