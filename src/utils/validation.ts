import { InvalidInputError, NotFoundError } from "./errors";

// Ledger amounts are whole minor units; anything past MAX_SAFE_INTEGER loses precision.
export const isAmount = (value: number): boolean => Number.isSafeInteger(value) && value > 0;

export const requireText = (value: string, field: string): string => {
  if (value.trim().length === 0) {
    throw new InvalidInputError(`${field} must not be empty`);
  }
  return value;
};

export const requireAmount = (value: number, field: string): number => {
  if (!isAmount(value)) {
    throw new InvalidInputError(`${field} must be a positive whole amount`);
  }
  return value;
};

export const requireSum = (left: number, right: number, field: string): number => {
  const sum = left + right;
  if (!Number.isSafeInteger(sum)) {
    throw new InvalidInputError(`${field} would exceed the largest representable amount`);
  }
  return sum;
};

// Request payload readers: the body is untyped JSON, so each field is checked before it reaches the ledger.

export type Payload = Record<string, unknown>;

export const asPayload = (body: unknown): Payload => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  const payload: Payload = {};
  for (const [key, value] of Object.entries(body)) {
    payload[key] = value;
  }
  return payload;
};

export const readString = (payload: Payload, field: string, fallback?: string): string => {
  const value = payload[field];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new InvalidInputError(`${field} must be a string`);
  }
  return value;
};

export const readNumber = (payload: Payload, field: string): number => {
  const value = payload[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a number`);
  }
  return value;
};

export const readBoolean = (payload: Payload, field: string): boolean => {
  const value = payload[field];
  if (typeof value !== "boolean") {
    throw new InvalidInputError(`${field} must be a boolean`);
  }
  return value;
};

export const readStringList = (payload: Payload, field: string): string[] => {
  const value = payload[field];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError(`${field} must be a list of strings`);
  }
  return value.map((entry, index) => {
    if (typeof entry !== "string") {
      throw new InvalidInputError(`${field}[${index}] must be a string`);
    }
    return entry;
  });
};

export const parseId = (raw: string | undefined, label: string): number => {
  const id = /^\d+$/.test(raw ?? "") ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new NotFoundError(`${label} ${raw ?? ""} does not exist`);
  }
  return id;
};
