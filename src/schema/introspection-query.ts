/**
 * Introspection query sent to the GraphQL API
 *
 * Same shape as the standard introspection query, with type references
 * nested INTROSPECTION_TYPE_DEPTH levels deep.
 */

/**
 * Number of type-reference levels the query fetches
 * `[Job!]!` needs all four: NON_NULL → LIST → NON_NULL → OBJECT.
 */
export const INTROSPECTION_TYPE_DEPTH = 4;

export const INTROSPECTION_QUERY = `
query IntrospectionQuery {
  __schema {
    queryType { name }
    mutationType { name }
    subscriptionType { name }
    types { ...FullType }
    directives {
      name
      description
      locations
      args { ...InputValue }
    }
  }
}

fragment FullType on __Type {
  kind
  name
  description
  fields {
    name
    description
    args { ...InputValue }
    type { ...TypeRef }
    isDeprecated
    deprecationReason
  }
  inputFields { ...InputValue }
  interfaces { ...TypeRef }
  enumValues {
    name
    description
    isDeprecated
    deprecationReason
  }
  possibleTypes { ...TypeRef }
}

fragment InputValue on __InputValue {
  name
  description
  type { ...TypeRef }
  defaultValue
}

fragment TypeRef on __Type {
  kind
  name
  ofType {
    kind
    name
    ofType {
      kind
      name
      ofType {
        kind
        name
      }
    }
  }
}
`.trim();
