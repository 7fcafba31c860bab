import { Config, Context, Effect, Layer } from "effect";

export const SUPPORTED_NETWORKS = ["Mainnet", "Preprod", "Preview"] as const;
export type Network = (typeof SUPPORTED_NETWORKS)[number];

/** Network id as written in address headers and body key `15`. */
export const networkId = (network: Network): number => {
  switch (network) {
    case "Mainnet":
      return 1;
    case "Preprod":
    case "Preview":
      return 0;
  }
};

export const DEFAULT_DOCUMENT_METADATA_LABEL = 1787;

export type ToolkitConfigDep = {
  NETWORK: Network;
  NETWORK_ID: number;
  DOCUMENT_METADATA_LABEL: number;
};

export const makeConfig = Effect.gen(function* () {
  const [network, documentLabel] = yield* Config.all([
    Config.literal(...SUPPORTED_NETWORKS)("NETWORK").pipe(
      Config.withDefault("Preprod" as const),
    ),
    Config.integer("DOCUMENT_METADATA_LABEL").pipe(
      Config.validate({
        message: "DOCUMENT_METADATA_LABEL must be a non-negative integer",
        validation: (label) => label >= 0,
      }),
      Config.withDefault(DEFAULT_DOCUMENT_METADATA_LABEL),
    ),
  ]);
  return {
    NETWORK: network,
    NETWORK_ID: networkId(network),
    DOCUMENT_METADATA_LABEL: documentLabel,
  };
}).pipe(Effect.orDie);

export class ToolkitConfig extends Context.Tag("ToolkitConfig")<
  ToolkitConfig,
  ToolkitConfigDep
>() {
  static readonly layer = Layer.effect(ToolkitConfig, makeConfig);
}
