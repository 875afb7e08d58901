/**
 * @file Error Message Catalog
 *
 * Message templates for every error the compiler raises, plus the default
 * formatter. Callers that localize messages pass their own
 * {@link MessageFormatter} through the compile options; the templates double
 * as catalog keys.
 *
 * @module mql-compiler/messages
 */

import type { MessageFormatter } from './types/index.js'

/**
 * Message templates keyed by error code. Placeholders use `{name}` syntax.
 */
export const MESSAGES = {
  complexity_exceeded: 'This query is too complex.',
  invalid_op: 'Invalid operator.',
  invalid_mod_field: '$mod may only be used on integer fields.',
  invalid_in_comp: '$in and $nin values must be a list.',
  invalid_mod_values: '$mod value must be a list of two integers.',
  invalid_mod_divisor: '$mod divisor must not be zero.',
  invalid_relation_comp: "Relationships can't be checked for equality.",
  invalid_relation_primitive: "Relationships can't be compared to primitive values.",
  invalid_attr_comp: "Attempts at comparing an attribute to an object aren't valid.",
  invalid_empty_comp: "Fields can't be compared to empty objects.",
  invalid_elem_match: '$elemMatch not applied to subobject.',
  data_conversion_error: 'Unable to convert provided data to the proper type for this field.',
  invalid_filter_document: 'Filter must be a filter object.',
  invalid_logical_list: '{op} value must be a list of filter objects.',
  invalid_logical_object: '{op} value must be a filter object.',
  invalid_field_path: 'Invalid field path: {reason}.',
  unknown_field: 'Unknown field: {field}.',
  invalid_whitelist_permission: 'Attempt made to query a field without proper permission.',
} as const

export type MessageKey = keyof typeof MESSAGES

const PLACEHOLDER_REGEX = /\{(\w+)\}/g

/**
 * Default formatter: substitutes `{name}` placeholders, leaving unknown
 * placeholders untouched.
 *
 * @example
 * ```typescript
 * defaultFormatMessage('Unknown field: {field}.', { field: 'tracks.nme' })
 * // 'Unknown field: tracks.nme.'
 * ```
 */
export const defaultFormatMessage: MessageFormatter = (template, variables) => {
  if (!variables) {
    return template
  }
  return template.replace(PLACEHOLDER_REGEX, (match, name: string) => {
    const value = variables[name]
    return value === undefined ? match : String(value)
  })
}
