import {UnresolvedVariableError} from '../errors.js'

/** Mapping from variable name to resolved value for one recipe invocation. */
export type VariableScope = Readonly<Record<string, string>>

// `%%` is a literal percent sign, `%(name)s` a variable marker.
const markerPattern = /%%|%\((\w+)\)s/g

/**
 * Expands every `%(name)s` marker in a template.
 *
 * Substitution is a single pass: values inserted into the result are never
 * scanned again, so a value containing `%(other)s` stays verbatim.
 * A `%` that starts neither `%%` nor a marker is kept as is.
 *
 * @throws UnresolvedVariableError when a marker has no binding in the scope
 */
export function substitute(template: string, scope: VariableScope): string {
  return template.replaceAll(markerPattern, (_marker, name: string | undefined) => {
    if (name === undefined) {
      return '%'
    }

    if (!Object.hasOwn(scope, name)) {
      throw new UnresolvedVariableError(name, template)
    }

    return scope[name]
  })
}

/** Expands every element of an argument list. */
export function substituteAll(templates: readonly string[], scope: VariableScope): string[] {
  return templates.map(template => substitute(template, scope))
}

/** Names of the variables a template refers to, in order of first appearance. */
export function referencedVariables(template: string): string[] {
  const names: string[] = []
  for (const match of template.matchAll(markerPattern)) {
    const name = match[1]
    if (name !== undefined && !names.includes(name)) {
      names.push(name)
    }
  }

  return names
}
