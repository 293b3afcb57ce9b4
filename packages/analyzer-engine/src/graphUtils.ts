import {
  Kind,
  OperationTypeNode,
  parse,
  print,
  type DocumentNode,
  type FieldNode,
  type OperationDefinitionNode,
} from 'graphql'
import { z } from 'zod'

export const GraphQLErrorSchema = z.object({
  message: z.string(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
})

export const GraphQLResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
})

/** Respuesta GraphQL con `data` tipado */
export function graphQLResponseSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    data: data.nullish(),
    errors: z.array(GraphQLErrorSchema).optional(),
  })
}

function field(name: string, selections: FieldNode[] = []): FieldNode {
  return {
    kind: Kind.FIELD,
    name: { kind: Kind.NAME, value: name },
    selectionSet:
      selections.length > 0
        ? { kind: Kind.SELECTION_SET, selections }
        : undefined,
  }
}

/** Construye una query con un único campo raíz y sus campos escalares */
export function buildFieldQuery(rootField: string, fields: string[]): string {
  const operation: OperationDefinitionNode = {
    kind: Kind.OPERATION_DEFINITION,
    operation: OperationTypeNode.QUERY,
    selectionSet: {
      kind: Kind.SELECTION_SET,
      selections: [field(rootField, fields.map((name) => field(name)))],
    },
  }
  const document: DocumentNode = { kind: Kind.DOCUMENT, definitions: [operation] }
  return print(document)
}

/** Valida la sintaxis de una operación y la normaliza */
export function normalizeOperation(source: string): string {
  return print(parse(source))
}

export function graphQLPayload(
  query: string,
  variables?: Record<string, unknown>
): { query: string; variables?: Record<string, unknown> } {
  return variables ? { query, variables } : { query }
}
