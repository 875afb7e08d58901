/**
 * @file Schema Definition
 *
 * Declarative builder for the models a filter is compiled against. Any
 * object implementing {@link SchemaModel} can be passed to the compiler;
 * this module provides a validated, ready-made implementation.
 *
 * @example
 * ```typescript
 * const schema = defineSchema({
 *   Artist: { fields: { artist_id: 'int', name: 'text' } },
 *   Album: {
 *     fields: {
 *       album_id: 'int',
 *       title: { type: 'text' },
 *       artist: { relation: 'Artist', cardinality: 'one' },
 *     },
 *   },
 * })
 *
 * compileFilter(schema.model('Album'), { 'artist.name': 'The Lanterns' })
 * ```
 *
 * @module mql-compiler/schema/define-schema
 */

import { z } from 'zod'
import { SchemaDefinitionError } from '../errors.js'
import { describeFieldPathProblem } from '../query/field-path-sanitization.js'
import { SCALAR_TYPES } from '../types/index.js'
import type { FieldDescriptor, RelationField, ScalarField, SchemaModel } from '../types/index.js'

// =============================================================================
// Definition Schema
// =============================================================================

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/

const identifierSchema = z
  .string()
  .regex(IDENTIFIER_REGEX, 'Must be an identifier')
  .refine((name) => describeFieldPathProblem(name) === null, 'Reserved property name')

const scalarTypeSchema = z.enum(SCALAR_TYPES)

const fieldDefinitionSchema = z.union([
  scalarTypeSchema,
  z.object({ type: scalarTypeSchema }).strict(),
  z
    .object({
      relation: identifierSchema,
      cardinality: z.enum(['one', 'many']),
    })
    .strict(),
])

const modelDefinitionSchema = z
  .object({
    fields: z.record(identifierSchema, fieldDefinitionSchema),
  })
  .strict()

/**
 * Zod schema for a whole schema definition, keyed by model name.
 */
export const schemaDefinitionSchema = z.record(identifierSchema, modelDefinitionSchema)

export type FieldDefinition = z.input<typeof fieldDefinitionSchema>
export type ModelDefinition = z.input<typeof modelDefinitionSchema>
export type SchemaDefinition = z.input<typeof schemaDefinitionSchema>

// =============================================================================
// Models
// =============================================================================

/**
 * A model built by {@link defineSchema}.
 */
export class DefinedModel implements SchemaModel {
  constructor(
    readonly name: string,
    private readonly fields: ReadonlyMap<string, FieldDescriptor>
  ) {}

  getField(name: string): FieldDescriptor | undefined {
    return this.fields.get(name)
  }

  /**
   * Names of every declared field, in declaration order.
   */
  get fieldNames(): string[] {
    return [...this.fields.keys()]
  }

  /**
   * Returns a scalar field, for authoring predicates by hand.
   *
   * @throws Error if the field is missing or is a relation
   */
  scalar(name: string): ScalarField {
    const field = this.fields.get(name)
    if (!field || field.kind !== 'scalar') {
      throw new Error(`${this.name}.${name} is not a scalar field`)
    }
    return field
  }

  /**
   * Returns a relation field.
   *
   * @throws Error if the field is missing or is a scalar
   */
  relation(name: string): RelationField {
    const field = this.fields.get(name)
    if (!field || field.kind !== 'relation') {
      throw new Error(`${this.name}.${name} is not a relation`)
    }
    return field
  }
}

/**
 * The models of a defined schema.
 */
export interface Schema {
  /**
   * Looks up a model by name.
   * @throws Error if no such model was defined
   */
  model(name: string): DefinedModel
  readonly models: readonly DefinedModel[]
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Builds a schema from a declarative definition.
 *
 * Relations may point at any model in the same definition, including the
 * declaring model itself. Models are created first and fields attached in
 * a second pass, so cycles are fine.
 *
 * @throws SchemaDefinitionError listing every problem found
 */
export function defineSchema(definition: SchemaDefinition): Schema {
  const result = schemaDefinitionSchema.safeParse(definition)
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    )
    throw new SchemaDefinitionError(`Invalid schema definition: ${issues.join('; ')}`, issues)
  }

  const fieldMaps = new Map<string, Map<string, FieldDescriptor>>()
  const models = new Map<string, DefinedModel>()
  for (const modelName of Object.keys(result.data)) {
    const fields = new Map<string, FieldDescriptor>()
    fieldMaps.set(modelName, fields)
    models.set(modelName, new DefinedModel(modelName, fields))
  }

  const issues: string[] = []
  for (const [modelName, modelDefinition] of Object.entries(result.data)) {
    const fields = fieldMaps.get(modelName)
    if (!fields) {
      continue
    }

    for (const [fieldName, fieldDefinition] of Object.entries(modelDefinition.fields)) {
      if (typeof fieldDefinition === 'string') {
        fields.set(fieldName, { kind: 'scalar', name: fieldName, model: modelName, valueType: fieldDefinition })
      } else if ('type' in fieldDefinition) {
        fields.set(fieldName, { kind: 'scalar', name: fieldName, model: modelName, valueType: fieldDefinition.type })
      } else {
        const target = models.get(fieldDefinition.relation)
        if (!target) {
          issues.push(
            `${modelName}.fields.${fieldName}.relation: Unknown model '${fieldDefinition.relation}'`
          )
          continue
        }
        fields.set(fieldName, {
          kind: 'relation',
          name: fieldName,
          model: modelName,
          target,
          cardinality: fieldDefinition.cardinality,
        })
      }
    }
  }

  if (issues.length > 0) {
    throw new SchemaDefinitionError(`Invalid schema definition: ${issues.join('; ')}`, issues)
  }

  return {
    model(name: string): DefinedModel {
      const model = models.get(name)
      if (!model) {
        throw new Error(`Unknown model: ${name}`)
      }
      return model
    },
    models: [...models.values()],
  }
}
