import { isBuilderError } from "@webfold/lib";
import { TransportError } from "@webfold/uni-fetch";

export class ConfigError extends Error {
  readonly name = "ConfigError";
}

const fieldOf = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;

const asNumber = (value: unknown) => (typeof value === "number" ? value : undefined);

export const exitCodeOf = (error: unknown) =>
  asNumber(fieldOf(error, "exitCode")) ?? asNumber(fieldOf(fieldOf(error, "oclif"), "exit")) ?? 1;

const isExpectedError = (error: unknown) =>
  isBuilderError(error) ||
  error instanceof TransportError ||
  error instanceof ConfigError ||
  fieldOf(error, "oclif") !== undefined;

// Failures the user can act on print their message; anything else prints its stack.
export const describeError = (error: unknown) => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (isExpectedError(error)) {
    return error.message;
  }
  return error.stack ?? error.message;
};
