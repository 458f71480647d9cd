import { BackendUnavailableError } from '../errors.js';
import { SheetModel } from '../sheet.js';
import type { Bounds } from '../types.js';
import { GridStore } from './store.js';

/** Workbooks that live only in this process. */
export class MemoryWorkbookStore extends GridStore {
  readonly kind = 'memory' as const;

  constructor(private readonly bounds: Bounds | null = null) {
    super();
  }

  /** Installs a workbook; replacing an existing one counts as an outside write. */
  put(model: SheetModel): void {
    const existed = this.models.has(model.id);
    this.models.set(model.id, model);
    if (existed) this.emit({ workbookId: model.id, sheet: null, origin: null, kind: 'replace', revision: model.revision });
  }

  protected async load(workbookId: string) {
    const model = this.models.get(workbookId);
    if (!model) throw new BackendUnavailableError(workbookId, 'not_found', `Workbook not found: ${workbookId}`);
    return { model, bounds: this.bounds };
  }
}
