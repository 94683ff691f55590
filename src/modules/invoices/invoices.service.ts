import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { requireId } from '../../common/utils/require-id';
import { toQuery } from '../../common/utils/serialization';
import { Invoice } from '../../models/invoice.model';
import { InvoiceFiltersDto } from './dto/invoice-filters.dto';

const INVOICES: ResourceDefinition<Invoice> = {
  model: Invoice,
  path: 'v2/invoices',
  resource: 'invoices',
  singular: 'invoice',
  plural: 'invoices',
  defaults: { view: 'all' },
};

type InvoiceTransition = 'mark_as_sent' | 'mark_as_draft' | 'mark_as_cancelled' | 'mark_as_scheduled';

@Injectable()
export class InvoicesService extends CachedResourceService<Invoice> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, INVOICES);
  }

  async getAll(filters: InvoiceFiltersDto = {}): Promise<Invoice[]> {
    return this.list(toQuery(InvoiceFiltersDto, filters));
  }

  async getAllByContact(contactUrl: string): Promise<Invoice[]> {
    return this.getAll({ contact: requireId(contactUrl, 'contactUrl') });
  }

  async getAllByProject(projectUrl: string): Promise<Invoice[]> {
    return this.getAll({ project: requireId(projectUrl, 'projectUrl') });
  }

  async create(invoice: Partial<Invoice>): Promise<Invoice> {
    return this.insert(invoice);
  }

  /**
   * Marks the invoice as sent without emailing it.
   */
  async markAsSent(id: string): Promise<void> {
    await this.transition(id, 'mark_as_sent');
  }

  async markAsDraft(id: string): Promise<void> {
    await this.transition(id, 'mark_as_draft');
  }

  async markAsCancelled(id: string): Promise<void> {
    await this.transition(id, 'mark_as_cancelled');
  }

  async markAsScheduled(id: string): Promise<void> {
    await this.transition(id, 'mark_as_scheduled');
  }

  private async transition(id: string, transition: InvoiceTransition): Promise<void> {
    const invoiceId = requireId(id);
    await this.cacheService.mutateAndInvalidate(async () => {
      await this.apiClient.put(`${this.entityPath(invoiceId)}/transitions/${transition}`);
      this.logger.debug(`Invoice ${invoiceId}: ${transition}`);
    }, this.keys.invalidation(invoiceId));
  }
}
