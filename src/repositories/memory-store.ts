/**
 * In-Memory Result Store
 * @module repositories/memory-store
 *
 * Storage driver that keeps everything in process. Filtering and latest
 * resolution run through the same predicate evaluator the query tests pin
 * down, so both drivers answer identically.
 */

import type {
  GroupReference,
  GroupWithCount,
  PendingResult,
  Result,
  Testcase,
  TestcaseReference,
} from '../types/results.js';
import type { ColumnFilter, GroupColumn, Page, PageRequest, TestcaseColumn } from '../query/types.js';
import { compareResults, matchesColumnFilters, matchesPredicates } from '../query/predicate-matcher.js';
import { resolveLatest } from '../query/latest-resolver.js';
import { createModuleLogger } from '../logging/logger.js';
import {
  IGroupRepository,
  IResultRepository,
  ITestcaseRepository,
  LatestResultQuery,
  ResultListQuery,
  ResultStore,
} from './interfaces.js';

const logger = createModuleLogger('memory-store');

// ============================================================================
// Shared State
// ============================================================================

interface StoredGroup {
  uuid: string;
  description: string | null;
  refUrl: string | null;
}

interface StoredResult extends Omit<Result, 'testcase'> {
  readonly testcaseName: string;
}

class MemoryState {
  readonly testcases = new Map<string, Testcase>();
  readonly groups = new Map<string, StoredGroup>();
  readonly results = new Map<number, StoredResult>();
  private lastId = 0;

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  toResult(stored: StoredResult): Result {
    const { testcaseName, ...rest } = stored;
    return {
      ...rest,
      testcase: this.testcases.get(testcaseName) ?? { name: testcaseName, refUrl: null },
    };
  }

  allResults(): Result[] {
    return [...this.results.values()].map((stored) => this.toResult(stored));
  }

  withCount(group: StoredGroup): GroupWithCount {
    let resultsCount = 0;
    for (const result of this.results.values()) {
      if (result.groups.includes(group.uuid)) {
        resultsCount += 1;
      }
    }
    return { ...group, resultsCount };
  }
}

function paginate<T>(items: readonly T[], page: PageRequest): Page<T> {
  const start = page.page * page.limit;
  return {
    items: items.slice(start, start + page.limit),
    hasMore: items.length > start + page.limit,
  };
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

function mergedTestcase(state: MemoryState, reference: TestcaseReference): Testcase {
  const existing = state.testcases.get(reference.name);
  return {
    name: reference.name,
    refUrl: reference.refUrl ?? existing?.refUrl ?? null,
  };
}

// ============================================================================
// Repositories
// ============================================================================

class MemoryTestcaseRepository implements ITestcaseRepository {
  constructor(private readonly state: MemoryState) {}

  async upsert(testcase: TestcaseReference): Promise<Testcase> {
    const merged = mergedTestcase(this.state, testcase);
    this.state.testcases.set(merged.name, merged);
    return merged;
  }

  async findByName(name: string): Promise<Testcase | null> {
    return this.state.testcases.get(name) ?? null;
  }

  async list(filters: readonly ColumnFilter<TestcaseColumn>[], page: PageRequest): Promise<Page<Testcase>> {
    const matching = [...this.state.testcases.values()]
      .filter((testcase) => matchesColumnFilters({ name: testcase.name }, filters))
      .sort(byKey((testcase) => testcase.name));
    return paginate(matching, page);
  }
}

class MemoryGroupRepository implements IGroupRepository {
  constructor(private readonly state: MemoryState) {}

  async upsert(group: GroupReference): Promise<GroupWithCount> {
    const existing = this.state.groups.get(group.uuid);
    const merged: StoredGroup = {
      uuid: group.uuid,
      description: group.description ?? existing?.description ?? null,
      refUrl: group.refUrl ?? existing?.refUrl ?? null,
    };
    this.state.groups.set(merged.uuid, merged);
    return this.state.withCount(merged);
  }

  async findByUuid(uuid: string): Promise<GroupWithCount | null> {
    const group = this.state.groups.get(uuid);
    return group ? this.state.withCount(group) : null;
  }

  async list(filters: readonly ColumnFilter<GroupColumn>[], page: PageRequest): Promise<Page<GroupWithCount>> {
    const matching = [...this.state.groups.values()]
      .filter((group) => matchesColumnFilters({ uuid: group.uuid, description: group.description }, filters))
      .sort(byKey((group) => group.uuid));
    return paginate(matching.map((group) => this.state.withCount(group)), page);
  }
}

class MemoryResultRepository implements IResultRepository {
  constructor(private readonly state: MemoryState) {}

  /**
   * Everything is staged first and applied in one synchronous step
   */
  async commit(pending: PendingResult): Promise<Result> {
    const testcase = mergedTestcase(this.state, pending.testcase);
    const newGroups = pending.groups
      .filter((group, index, all) => all.findIndex((other) => other.uuid === group.uuid) === index)
      .filter((group) => !this.state.groups.has(group.uuid))
      .map((group): StoredGroup => ({
        uuid: group.uuid,
        description: group.description ?? null,
        refUrl: group.refUrl ?? null,
      }));

    const stored: StoredResult = {
      id: this.state.nextId(),
      testcaseName: testcase.name,
      outcome: pending.outcome,
      submitTime: pending.submitTime,
      note: pending.note,
      refUrl: pending.refUrl,
      groups: [...new Set(pending.groups.map((group) => group.uuid))],
      data: pending.data.map((entry) => ({ key: entry.key, value: entry.value })),
    };

    this.state.testcases.set(testcase.name, testcase);
    for (const group of newGroups) {
      this.state.groups.set(group.uuid, group);
    }
    this.state.results.set(stored.id, stored);

    return this.state.toResult(stored);
  }

  async findById(id: number): Promise<Result | null> {
    const stored = this.state.results.get(id);
    return stored ? this.state.toResult(stored) : null;
  }

  async findMany(query: ResultListQuery): Promise<Page<Result>> {
    const matching = this.state
      .allResults()
      .filter((result) => matchesPredicates(result, query.predicates))
      .sort((a, b) => compareResults(a, b, query.sort));
    return paginate(matching, query.page);
  }

  async findLatest(query: LatestResultQuery): Promise<Page<Result>> {
    const candidates = this.state
      .allResults()
      .filter((result) => matchesPredicates(result, query.predicates));
    return paginate(resolveLatest(candidates, query.distinctOn, query.sort), query.page);
  }
}

// ============================================================================
// Store
// ============================================================================

export class MemoryResultStore implements ResultStore {
  readonly driver = 'memory';
  readonly testcases: ITestcaseRepository;
  readonly groups: IGroupRepository;
  readonly results: IResultRepository;

  constructor() {
    const state = new MemoryState();
    this.testcases = new MemoryTestcaseRepository(state);
    this.groups = new MemoryGroupRepository(state);
    this.results = new MemoryResultRepository(state);
    logger.info('Using in-memory result store');
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    logger.debug('In-memory result store closed');
  }
}
