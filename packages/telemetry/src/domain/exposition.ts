/**
 * Prometheus text exposition (format 0.0.4) of an aggregation snapshot.
 *
 * Output order is deterministic: `target_info` first, then instruments by
 * name, series by attribute key.
 */

import type { AggregatedMetric, InstrumentDescriptor } from "./Metric.js"
import { attributesKey } from "./Metric.js"
import type { Resource } from "./Resource.js"
import type { AttributeValue, Attributes } from "./Span.js"

export const EXPOSITION_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8"

const UNIT_SUFFIXES: Readonly<Record<string, string>> = {
  ms: "milliseconds",
  s: "seconds",
  By: "bytes"
}

export const sanitizeName = (name: string): string => {
  const sanitized = name.replace(/[^a-zA-Z0-9_:]/g, "_")
  return /^[0-9]/.test(sanitized) ? `_${sanitized}` : sanitized
}

export const escapeLabelValue = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")

export const metricName = (instrument: InstrumentDescriptor): string => {
  const base = sanitizeName(instrument.name)
  const suffix = UNIT_SUFFIXES[instrument.unit]
  const withUnit = suffix && !base.endsWith(`_${suffix}`) ? `${base}_${suffix}` : base
  return instrument.kind === "Counter" ? `${withUnit}_total` : withUnit
}

const formatNumber = (value: number): string => {
  if (value === Number.POSITIVE_INFINITY) return "+Inf"
  if (value === Number.NEGATIVE_INFINITY) return "-Inf"
  return String(value)
}

const formatLabelValue = (value: AttributeValue): string =>
  escapeLabelValue(typeof value === "string" ? value : String(value))

const formatLabels = (labels: ReadonlyArray<readonly [string, AttributeValue]>): string =>
  labels.length === 0
    ? ""
    : `{${labels.map(([key, value]) => `${sanitizeName(key)}="${formatLabelValue(value)}"`).join(",")}}`

const sortedLabels = (attributes: Attributes): Array<readonly [string, AttributeValue]> =>
  Object.keys(attributes)
    .sort()
    .map((key) => [key, attributes[key]] as const)

const renderTargetInfo = (resource: Resource): Array<string> => {
  const labels: Array<readonly [string, AttributeValue]> = [
    ["service.name", resource.serviceName],
    ["service.version", resource.serviceVersion],
    ["deployment.environment", resource.environment],
    ...sortedLabels(resource.attributes).filter(
      ([key]) => key !== "service.name" && key !== "service.version" && key !== "deployment.environment"
    )
  ]
  return [
    "# HELP target_info Target metadata",
    "# TYPE target_info gauge",
    `target_info${formatLabels(labels)} 1`
  ]
}

const renderSeries = (name: string, metric: AggregatedMetric): Array<string> => {
  const labels = sortedLabels(metric.attributes)
  if (metric._tag === "Sum") {
    return [`${name}${formatLabels(labels)} ${formatNumber(metric.value)}`]
  }

  const lines: Array<string> = []
  let cumulative = 0
  metric.instrument.boundaries.forEach((bound, index) => {
    cumulative += metric.bucketCounts[index]
    lines.push(`${name}_bucket${formatLabels([...labels, ["le", formatNumber(bound)]])} ${cumulative}`)
  })
  lines.push(`${name}_bucket${formatLabels([...labels, ["le", "+Inf"]])} ${metric.count}`)
  lines.push(`${name}_sum${formatLabels(labels)} ${formatNumber(metric.sum)}`)
  lines.push(`${name}_count${formatLabels(labels)} ${metric.count}`)
  return lines
}

export const renderExposition = (
  metrics: ReadonlyArray<AggregatedMetric>,
  resource: Resource
): string => {
  const byInstrument = new Map<string, Array<AggregatedMetric>>()
  for (const metric of metrics) {
    const series = byInstrument.get(metric.instrument.name) ?? []
    series.push(metric)
    byInstrument.set(metric.instrument.name, series)
  }

  const lines = renderTargetInfo(resource)
  for (const instrumentName of [...byInstrument.keys()].sort()) {
    const series = byInstrument.get(instrumentName) ?? []
    if (series.length === 0) continue
    const instrument = series[0].instrument
    const name = metricName(instrument)
    if (instrument.description.length > 0) {
      lines.push(`# HELP ${name} ${instrument.description.replace(/\\/g, "\\\\").replace(/\n/g, "\\n")}`)
    }
    lines.push(`# TYPE ${name} ${instrument.kind === "Counter" ? "counter" : "histogram"}`)
    const ordered = [...series].sort((a, b) =>
      attributesKey(a.attributes).localeCompare(attributesKey(b.attributes))
    )
    for (const metric of ordered) {
      lines.push(...renderSeries(name, metric))
    }
  }

  return `${lines.join("\n")}\n`
}
