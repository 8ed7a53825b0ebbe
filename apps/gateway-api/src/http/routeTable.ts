import {RouteDefinitionError} from '../errors'
import type {MatchResult, RouteDefinition, RouteRegistration} from './types'

export const DEFAULT_SEGMENT_CONSTRAINT = '[^/]+'

const VARIABLE_SEGMENT_SPLIT = /(\{[A-Za-z_]\w*\})/u
const VARIABLE_SEGMENT = /^\{([A-Za-z_]\w*)\}$/u

type CompiledRoute = {
  definition: RouteDefinition
  matcher: RegExp
  segmentNames: readonly string[]
}

export type RouteTable = {
  register: (registration: RouteRegistration) => RouteDefinition
  match: (path: string, method: string) => MatchResult | undefined
  routes: () => readonly RouteDefinition[]
  seal: () => void
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/gu, '\\$&')

const decodePath = (path: string) => {
  try {
    return decodeURIComponent(path)
  } catch {
    return undefined
  }
}

export const describeRoute = (route: RouteDefinition) => {
  const methods = route.methodConstraint.size === 0 ? '*' : [...route.methodConstraint].sort().join(',')
  return `${methods} ${route.pattern}`
}

const compileRoute = (registration: RouteRegistration): CompiledRoute => {
  const {pattern} = registration
  if (pattern.length === 0) {
    throw new RouteDefinitionError(pattern, 'pattern must not be empty')
  }
  if (!pattern.startsWith('/')) {
    throw new RouteDefinitionError(pattern, 'pattern must start with "/"')
  }

  const requirements = registration.requirements ?? {}
  const segmentNames: string[] = []
  const constraints: Record<string, string> = {}
  let source = '^'

  for (const part of pattern.split(VARIABLE_SEGMENT_SPLIT)) {
    const variable = VARIABLE_SEGMENT.exec(part)
    const name = variable?.[1]
    if (!name) {
      if (part.includes('{') || part.includes('}')) {
        throw new RouteDefinitionError(pattern, `malformed segment near "${part}"`)
      }
      source += escapeRegExp(part)
      continue
    }

    if (segmentNames.includes(name)) {
      throw new RouteDefinitionError(pattern, `segment "${name}" appears more than once`)
    }

    const constraint = requirements[name] ?? DEFAULT_SEGMENT_CONSTRAINT
    try {
      new RegExp(constraint)
    } catch {
      throw new RouteDefinitionError(pattern, `constraint for "${name}" is not a valid regular expression`)
    }

    segmentNames.push(name)
    constraints[name] = constraint
    source += `(?<${name}>(?:${constraint}))`
  }

  for (const name of Object.keys(requirements)) {
    if (!segmentNames.includes(name)) {
      throw new RouteDefinitionError(pattern, `constraint "${name}" does not name a segment`)
    }
  }

  const definition: RouteDefinition = Object.freeze({
    pattern,
    methodConstraint: new Set((registration.methods ?? []).map(method => method.toUpperCase())),
    segmentConstraints: Object.freeze(constraints),
    handlerRef: registration.handler,
    ...(registration.action !== undefined ? {action: registration.action} : {})
  })

  return {
    definition,
    matcher: new RegExp(`${source}$`),
    segmentNames
  }
}

/**
 * Ordered route definitions. Matching walks them in registration order and the
 * first definition whose pattern, constraints and method all accept the request
 * wins. Paths are compared after percent-decoding and are never normalised.
 */
export const createRouteTable = (): RouteTable => {
  const compiledRoutes: CompiledRoute[] = []
  let sealed = false

  const register = (registration: RouteRegistration) => {
    if (sealed) {
      throw new RouteDefinitionError(registration.pattern, 'the route table is sealed')
    }

    const compiled = compileRoute(registration)
    compiledRoutes.push(compiled)
    return compiled.definition
  }

  const match = (path: string, method: string): MatchResult | undefined => {
    const decodedPath = decodePath(path)
    if (decodedPath === undefined) {
      return undefined
    }

    const normalizedMethod = method.toUpperCase()
    for (const compiled of compiledRoutes) {
      const {methodConstraint} = compiled.definition
      if (methodConstraint.size > 0 && !methodConstraint.has(normalizedMethod)) {
        continue
      }

      const result = compiled.matcher.exec(decodedPath)
      if (!result) {
        continue
      }

      const segments: Record<string, string> = {}
      for (const name of compiled.segmentNames) {
        const value = result.groups?.[name]
        if (value !== undefined) {
          segments[name] = value
        }
      }

      return {route: compiled.definition, segments: Object.freeze(segments)}
    }

    return undefined
  }

  return {
    register,
    match,
    routes: () => compiledRoutes.map(compiled => compiled.definition),
    seal: () => {
      sealed = true
    }
  }
}
