/**
 * Client configuration.
 */

import { Config, Context, Effect, Layer, Option } from "effect";

export interface EnvironmentShape {
  /** Base URL of the search service. */
  readonly host: string;
  /** Bearer credential; requests are sent without `Authorization` when unset. */
  readonly apiKey?: string;
}

export class Environment extends Context.Tag("Environment")<
  Environment,
  EnvironmentShape
>() {}

export const DEFAULT_HOST = "http://localhost:7700";

/**
 * Reads `SEARCHLANE_HOST` and `SEARCHLANE_API_KEY` from the active
 * `ConfigProvider` (process environment by default).
 */
export const EnvironmentLive = Layer.effect(
  Environment,
  Effect.gen(function* () {
    const host = yield* Config.string("SEARCHLANE_HOST").pipe(
      Config.withDefault(DEFAULT_HOST)
    );
    const apiKey = yield* Config.option(Config.string("SEARCHLANE_API_KEY"));

    yield* Effect.logDebug(`[ENV] Using search service at ${host}`);

    return {
      host,
      apiKey: Option.getOrUndefined(apiKey),
    };
  })
);

/**
 * Environment from explicit values.
 */
export const makeEnvironment = (values: EnvironmentShape) =>
  Layer.succeed(Environment, values);
