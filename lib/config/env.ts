import { AppError } from "@/lib/errors/app-error";

export function readEnv(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}

export function parseBoolean(value: string | undefined | null): boolean {
  if (!value) {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function parsePositiveInteger(
  name: string,
  rawValue: string | undefined,
  fallback: number,
  errorCode: string,
): number {
  if (!rawValue || rawValue.trim() === "") {
    return fallback;
  }

  const parsed = Number(rawValue.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(
      `${name} must be a positive integer (received "${rawValue}").`,
      errorCode,
      500,
    );
  }

  return parsed;
}
