import { ValidationError } from "@/lib/errors";
import type { ParameterDescriptor } from "@/types/plugins";
import type { OperationParams, ParamValue } from "@/types/signals";

export function numberParam(
  params: OperationParams,
  name: string,
  fallback: number,
): number {
  const value = params[name];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new ValidationError(`Parameter '${name}' must be a number`, {
    name,
    value,
  });
}

export function optionalNumberParam(
  params: OperationParams,
  name: string,
): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  return numberParam(params, name, 0);
}

export function booleanParam(
  params: OperationParams,
  name: string,
  fallback: boolean,
): boolean {
  const value = params[name];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ValidationError(`Parameter '${name}' must be a boolean`, {
    name,
    value,
  });
}

export function stringParam(
  params: OperationParams,
  name: string,
  fallback: string,
): string {
  const value = params[name];
  if (value === undefined || value === null) return fallback;
  return String(value);
}

/**
 * Defaults from the descriptors, overlaid by each layer in turn.
 */
export function mergeParameters(
  descriptors: ParameterDescriptor[],
  ...layers: Array<Record<string, ParamValue> | undefined>
): OperationParams {
  const merged: OperationParams = {};
  for (const descriptor of descriptors) {
    merged[descriptor.name] = descriptor.default;
  }
  for (const layer of layers) {
    if (layer) Object.assign(merged, layer);
  }
  return merged;
}

/**
 * Omit keys from a parameter map without mutating it
 */
export function withoutParams(
  params: OperationParams,
  keys: string[],
): OperationParams {
  const result: OperationParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (!keys.includes(key)) result[key] = value;
  }
  return result;
}
