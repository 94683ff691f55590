import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { toQuery } from '../../common/utils/serialization';
import { Contact } from '../../models/contact.model';
import { ContactFiltersDto } from './dto/contact-filters.dto';

const CONTACTS: ResourceDefinition<Contact> = {
  model: Contact,
  path: 'v2/contacts',
  resource: 'contacts',
  singular: 'contact',
  plural: 'contacts',
};

@Injectable()
export class ContactsService extends CachedResourceService<Contact> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, CONTACTS);
  }

  async getAll(filters: ContactFiltersDto = {}): Promise<Contact[]> {
    return this.list(toQuery(ContactFiltersDto, filters));
  }

  /**
   * Contacts with at least one active project, picked from the full
   * contact list. Cached under a list key of its own.
   */
  async getAllWithActiveProjects(): Promise<Contact[]> {
    return this.cacheService.getOrFetchList(this.keys, { active_projects: true }, async () => {
      const contacts = await this.getAll({ view: 'all' });
      return contacts.filter((contact) => (contact.activeProjectsCount ?? 0) > 0);
    });
  }

  async create(contact: Partial<Contact>): Promise<Contact> {
    return this.insert(contact);
  }
}
