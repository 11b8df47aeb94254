/**
 * Query Fields - Named accessors over the candidate query, keyed by wire name
 */

import { CandidateQuery } from './types';
import { StringOrList, hasValues } from './string-or-list';

export type ScalarFieldName =
  | 'log_source'
  | 'timeframe'
  | 'resource_name_pattern'
  | 'user_pattern'
  | 'namespace_pattern'
  | 'request_uri_pattern'
  | 'auth_decision'
  | 'sort_by'
  | 'sort_order'
  | 'subresource'
  | 'request_object_filter'
  | 'authorization_reason_pattern'
  | 'response_message_pattern'
  | 'missing_annotation';

export type ListFieldName =
  | 'verb'
  | 'resource'
  | 'namespace'
  | 'user'
  | 'response_status'
  | 'source_ip'
  | 'group_by';

export const SCALAR_FIELDS: readonly ScalarFieldName[] = [
  'log_source',
  'timeframe',
  'resource_name_pattern',
  'user_pattern',
  'namespace_pattern',
  'request_uri_pattern',
  'auth_decision',
  'sort_by',
  'sort_order',
  'subresource',
  'request_object_filter',
  'authorization_reason_pattern',
  'response_message_pattern',
  'missing_annotation'
];

export const LIST_FIELDS: readonly ListFieldName[] = [
  'verb',
  'resource',
  'namespace',
  'user',
  'response_status',
  'source_ip',
  'group_by'
];

/** Free-text pattern fields, in the order the cost model and sanitizer visit them */
export const PATTERN_FIELDS: readonly ScalarFieldName[] = [
  'user_pattern',
  'namespace_pattern',
  'resource_name_pattern',
  'request_uri_pattern',
  'authorization_reason_pattern',
  'response_message_pattern'
];

export function scalarField(query: CandidateQuery, name: ScalarFieldName): string {
  switch (name) {
    case 'log_source': return query.logSource ?? '';
    case 'timeframe': return query.timeframe ?? '';
    case 'resource_name_pattern': return query.resourceNamePattern ?? '';
    case 'user_pattern': return query.userPattern ?? '';
    case 'namespace_pattern': return query.namespacePattern ?? '';
    case 'request_uri_pattern': return query.requestUriPattern ?? '';
    case 'auth_decision': return query.authDecision ?? '';
    case 'sort_by': return query.sortBy ?? '';
    case 'sort_order': return query.sortOrder ?? '';
    case 'subresource': return query.subresource ?? '';
    case 'request_object_filter': return query.requestObjectFilter ?? '';
    case 'authorization_reason_pattern': return query.authorizationReasonPattern ?? '';
    case 'response_message_pattern': return query.responseMessagePattern ?? '';
    case 'missing_annotation': return query.missingAnnotation ?? '';
  }
}

export function listField(query: CandidateQuery, name: ListFieldName): StringOrList | undefined {
  switch (name) {
    case 'verb': return query.verb;
    case 'resource': return query.resource;
    case 'namespace': return query.namespace;
    case 'user': return query.user;
    case 'response_status': return query.responseStatus;
    case 'source_ip': return query.sourceIp;
    case 'group_by': return query.groupBy;
  }
}

export function listValues(query: CandidateQuery, name: ListFieldName): readonly string[] {
  return listField(query, name)?.values() ?? [];
}

function isScalarFieldName(name: string): name is ScalarFieldName {
  return SCALAR_FIELDS.some(field => field === name);
}

function isListFieldName(name: string): name is ListFieldName {
  return LIST_FIELDS.some(field => field === name);
}

/**
 * Presence test used by the required-field checks.
 * Unknown field names are never present.
 */
export function isFieldPresent(query: CandidateQuery, name: string): boolean {
  if (name === 'limit') {
    return (query.limit ?? 0) > 0;
  }
  if (name === 'log_source') {
    return (query.logSource ?? '').trim() !== '';
  }
  if (isScalarFieldName(name)) {
    return scalarField(query, name) !== '';
  }
  if (isListFieldName(name)) {
    return hasValues(listField(query, name));
  }
  return false;
}
