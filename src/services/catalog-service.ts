/**
 * Testcase and Group Service
 * @module services/catalog-service
 */

import { v4 as uuidv4 } from 'uuid';
import type { GroupReference, GroupWithCount, Testcase, TestcaseReference } from '../types/results.js';
import type { ColumnFilter, GroupColumn, Page, PageRequest, TestcaseColumn } from '../query/types.js';
import type { ResultStore } from '../repositories/interfaces.js';
import { NotFoundError, ResultsErrorCodes, ValidationError } from '../errors/index.js';

export interface GroupInput {
  uuid?: string;
  description?: string | null;
  refUrl?: string | null;
}

export class CatalogService {
  constructor(
    private readonly store: ResultStore,
    private readonly generateUuid: () => string = uuidv4
  ) {}

  // ============================================================================
  // Testcases
  // ============================================================================

  listTestcases(filters: readonly ColumnFilter<TestcaseColumn>[], page: PageRequest): Promise<Page<Testcase>> {
    return this.store.testcases.list(filters, page);
  }

  async getTestcase(name: string): Promise<Testcase> {
    const testcase = await this.store.testcases.findByName(name);
    if (!testcase) {
      throw NotFoundError.testcase(name);
    }
    return testcase;
  }

  async saveTestcase(testcase: TestcaseReference): Promise<Testcase> {
    if (testcase.name.length === 0) {
      throw ValidationError.forField(
        'name',
        'testcase name must be non-empty',
        ResultsErrorCodes.INVALID_TESTCASE
      );
    }
    return this.store.testcases.upsert(testcase);
  }

  // ============================================================================
  // Groups
  // ============================================================================

  listGroups(filters: readonly ColumnFilter<GroupColumn>[], page: PageRequest): Promise<Page<GroupWithCount>> {
    return this.store.groups.list(filters, page);
  }

  async getGroup(uuid: string): Promise<GroupWithCount> {
    const group = await this.store.groups.findByUuid(uuid);
    if (!group) {
      throw NotFoundError.group(uuid);
    }
    return group;
  }

  /**
   * Create or update a group; a uuid is generated when none is given
   */
  saveGroup(input: GroupInput): Promise<GroupWithCount> {
    const group: GroupReference = {
      uuid: input.uuid ?? this.generateUuid(),
      description: input.description,
      refUrl: input.refUrl,
    };
    return this.store.groups.upsert(group);
  }
}
