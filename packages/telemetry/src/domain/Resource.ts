import type { Attributes } from "./Span.js"

/**
 * Static identity of the emitting process. Built once at startup and frozen.
 */
export interface Resource {
  readonly serviceName: string
  readonly serviceVersion: string
  readonly environment: string
  readonly attributes: Attributes
}

export const makeResource = (resource: Resource): Resource =>
  Object.freeze({
    serviceName: resource.serviceName,
    serviceVersion: resource.serviceVersion,
    environment: resource.environment,
    attributes: Object.freeze({ ...resource.attributes })
  })

/**
 * Flatten to semantic-convention keys. Identity keys win over extra
 * attributes with the same name.
 */
export const resourceAttributes = (resource: Resource): Attributes => ({
  ...resource.attributes,
  "service.name": resource.serviceName,
  "service.version": resource.serviceVersion,
  "deployment.environment": resource.environment
})

/**
 * Parse OTEL_RESOURCE_ATTRIBUTES style input: `key=value,key2=value2`.
 * Entries without a key or `=` are skipped.
 */
export const parseResourceAttributes = (raw: string): Attributes => {
  const attributes: Record<string, string> = {}
  for (const entry of raw.split(",")) {
    const separator = entry.indexOf("=")
    if (separator <= 0) {
      continue
    }
    const key = entry.slice(0, separator).trim()
    const value = entry.slice(separator + 1).trim()
    if (key.length > 0) {
      attributes[key] = value
    }
  }
  return attributes
}
