import type { HttpClient } from "@effect/platform";
import type { Layer } from "effect";
import type { ConfigError } from "effect/ConfigError";
import { LiveNetworkDataLayer } from "./network-data/live.network-data.js";
import { StaticNetworkDataLayer } from "./network-data/static.network-data.js";
import type { NetworkDataSource } from "./network-data/types.js";

export const networkDataLayer = (
  offline: boolean
): Layer.Layer<NetworkDataSource, ConfigError, HttpClient.HttpClient> =>
  offline ? StaticNetworkDataLayer : LiveNetworkDataLayer;
