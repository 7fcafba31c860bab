import { describe, expect, it } from "vitest";
import { ConfigProvider, Effect, Exit, Layer } from "effect";
import { ToolkitConfig } from "@/services/config.js";

const readConfig = (env: Record<string, string>) =>
  Effect.runSyncExit(
    ToolkitConfig.pipe(
      Effect.provide(ToolkitConfig.layer),
      Effect.provide(
        Layer.setConfigProvider(
          ConfigProvider.fromMap(new Map(Object.entries(env))),
        ),
      ),
    ),
  );

describe("ToolkitConfig", () => {
  it("defaults to Preprod and the document label 1787", () => {
    const exit = readConfig({});
    expect(Exit.isSuccess(exit) ? exit.value : undefined).toEqual({
      NETWORK: "Preprod",
      NETWORK_ID: 0,
      DOCUMENT_METADATA_LABEL: 1787,
    });
  });

  it("maps the network to its id", () => {
    const exit = readConfig({
      NETWORK: "Mainnet",
      DOCUMENT_METADATA_LABEL: "674",
    });
    expect(Exit.isSuccess(exit) ? exit.value : undefined).toEqual({
      NETWORK: "Mainnet",
      NETWORK_ID: 1,
      DOCUMENT_METADATA_LABEL: 674,
    });
  });

  it("dies on an unknown network or a negative label", () => {
    expect(Exit.isFailure(readConfig({ NETWORK: "Custom" }))).toBe(true);
    expect(
      Exit.isFailure(readConfig({ DOCUMENT_METADATA_LABEL: "-1" })),
    ).toBe(true);
  });
});
