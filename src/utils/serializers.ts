/**
 * Wire Serializers
 * @module utils/serializers
 *
 * snake_case representations of entities with absolute `href` links. The
 * same result shape is returned by the HTTP API and published to the
 * message bus.
 */

import type { GroupWithCount, Result, Testcase } from '../types/results.js';
import { groupResultData } from '../types/results.js';
import { formatTimestamp } from './time.js';

// ============================================================================
// Wire Types
// ============================================================================

export interface SerializedTestcase {
  name: string;
  ref_url: string | null;
  href: string;
}

export interface SerializedGroup {
  uuid: string;
  description: string | null;
  ref_url: string | null;
  href: string;
  results_count: number;
  /** Listing of the group's results */
  results: string;
}

export interface SerializedResult {
  id: number;
  groups: string[];
  testcase: SerializedTestcase;
  submit_time: string;
  outcome: string;
  note: string | null;
  ref_url: string | null;
  data: Record<string, string[]>;
  href: string;
}

export interface PageLinks {
  prev: string | null;
  next: string | null;
}

export interface PagedResponse<T> extends PageLinks {
  data: T[];
}

/**
 * Percent-encode a path segment, leaving `/` readable for testcase names
 */
function encodePathSegment(value: string): string {
  return encodeURIComponent(value).replace(/%2F/g, '/');
}

/**
 * API path of a testcase, relative to the API root
 */
export function testcasePath(name: string): string {
  return `/testcases/${encodePathSegment(name)}`;
}

// ============================================================================
// Serializer
// ============================================================================

export class Serializer {
  private readonly baseUrl: string;

  /**
   * @param baseUrl - API root such as `https://host/api/v2.0`
   */
  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  testcase(testcase: Testcase): SerializedTestcase {
    return {
      name: testcase.name,
      ref_url: testcase.refUrl,
      href: this.url(testcasePath(testcase.name)),
    };
  }

  group(group: GroupWithCount): SerializedGroup {
    return {
      uuid: group.uuid,
      description: group.description,
      ref_url: group.refUrl,
      href: this.url(`/groups/${encodeURIComponent(group.uuid)}`),
      results_count: group.resultsCount,
      results: this.url(`/results?${new URLSearchParams({ groups: group.uuid }).toString()}`),
    };
  }

  result(result: Result): SerializedResult {
    return {
      id: result.id,
      groups: [...result.groups],
      testcase: this.testcase(result.testcase),
      submit_time: formatTimestamp(result.submitTime),
      outcome: result.outcome,
      note: result.note,
      ref_url: result.refUrl,
      data: groupResultData(result.data),
      href: this.url(`/results/${result.id}`),
    };
  }

  /**
   * Links to the neighbouring pages of a listing, keeping every other
   * query parameter
   */
  pageLinks(
    path: string,
    query: Readonly<Record<string, string | undefined>>,
    page: number,
    hasMore: boolean
  ): PageLinks {
    const link = (target: number): string => {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined && key !== 'page') {
          params.append(key, value);
        }
      }
      params.set('page', String(target));
      return this.url(`${path}?${params.toString()}`);
    };

    return {
      prev: page > 0 ? link(page - 1) : null,
      next: hasMore ? link(page + 1) : null,
    };
  }
}
