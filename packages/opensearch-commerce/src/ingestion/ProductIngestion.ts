import type { ProductIndexer } from '../indexers/ProductIndexer';
import type { ProductSource } from '../types/Catalog';
import { consoleLogger, type Logger } from '../services/Logger';

export type IngestionResult = { pages: number; items: number; failed: number };

export class ProductIngestion {
  constructor(
    private readonly source: ProductSource,
    private readonly indexer: ProductIndexer,
    private readonly pageSize: number = 500,
    private readonly logger: Logger = consoleLogger,
  ) {}

  /** Creates the index with the catalog mappings if needed, then pulls every page. */
  async runOnce(): Promise<IngestionResult> {
    await this.indexer.ensureIndex();

    let after: string | null | undefined = null;
    let pages = 0;
    let total = 0;
    let failed = 0;
    do {
      const page = await this.source.fetchProducts({ after, limit: this.pageSize });
      const items = page.items ?? [];
      if (items.length > 0) {
        const res = await this.indexer.index(items);
        total += res.indexed;
        failed += res.failed;
      }
      pages += 1;
      after = page.nextPageCursor;
    } while (after);

    this.logger.info(`Product ingestion finished: ${pages} pages, ${total} indexed, ${failed} failed`);
    return { pages, items: total, failed };
  }
}
