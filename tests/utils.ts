import { fromHex } from "@/utils.js";
import { TransactionId } from "@/identifiers.js";
import { TransactionBody } from "@/transaction/body.js";
import { TransactionInput } from "@/transaction/input.js";
import { TransactionOutput } from "@/transaction/output.js";
import { MultiAsset } from "@/value/multi-asset.js";
import { Primitive, type MapEntry } from "@/codec/primitive.js";

export const TX_ID_HEX =
  "732bfd67e66be8e8288349fcaaa2294973ef6271cc189a239bb431275401b8e5";

/** Testnet enterprise address (header `0x60`). */
export const ADDRESS_HEX =
  "60f6532850e1bccee9c72a9113ad98bcc5dbb30d2ac960262444f6e5f4";

export const INPUT_CBOR_HEX = `825820${TX_ID_HEX}00`;
export const OUTPUT_CBOR_HEX = `82581d${ADDRESS_HEX}1b000000174876e800`;

export const BODY_CBOR_HEX =
  "a50081825820732bfd67e66be8e8288349fcaaa2294973ef6271cc189a239bb431275401b8e" +
  "500018282581d60f6532850e1bccee9c72a9113ad98bcc5dbb30d2ac960262444f6e5f41b00" +
  "0000174876e80082581d60f6532850e1bccee9c72a9113ad98bcc5dbb30d2ac960262444f6e" +
  "5f41b000000ba43b4b7f7021a000288090d800e80";

export const BODY_HASH_HEX =
  "4b5b9ed087b596150f8c95f14de821ab066ddb74f00919228acf33b85d9ca6ca";

export const SIGNING_KEY_HEX =
  "093be5cd3987d0c9fd8854ef908f7746b69e2d73320db6dc0f780d81585b84c2";

export const SIGNING_KEY_ENVELOPE = JSON.stringify({
  type: "GenesisUTxOSigningKey_ed25519",
  description: "Genesis Initial UTxO Signing Key",
  cborHex: `5820${SIGNING_KEY_HEX}`,
});

export const VERIFICATION_KEY_HEX =
  "8be8339e9f3addfa6810d59e2f072f85e64d4c024c087e0d24f8317c6544f62f";

export const VERIFICATION_KEY_HASH_HEX =
  "d413c1745d306023e49589e658a7b7a4b4dda165ff5c97d8c8b979bf";

export const SIGNATURE_HEX =
  "b62b2d67ba18544ce0a19735f9528b890b1a2a7f8af903a3de927f91b81fdb46" +
  "bd79c915c70554dba469aab8a33990a71de0b0249f4c7e709d6029bbace15004";

export const SIGNED_TX_CBOR_HEX =
  `84${BODY_CBOR_HEX}` +
  `a10081825820${VERIFICATION_KEY_HEX}5840${SIGNATURE_HEX}` +
  "f5f6";

export const makeInput = (): TransactionInput =>
  new TransactionInput(TransactionId.fromHex(TX_ID_HEX), 0);

export const makeOutput = (coin: bigint): TransactionOutput =>
  new TransactionOutput(fromHex(ADDRESS_HEX), coin);

/** Two outputs to the same address, fee 165897, empty collateral and signers. */
export const makeBody = (): TransactionBody =>
  new TransactionBody({
    inputs: [makeInput()],
    outputs: [makeOutput(100_000_000_000n), makeOutput(799_999_834_103n)],
    fee: 165_897n,
    collateral: [],
    requiredSigners: [],
  });

/** Policy id made of 28 copies of one ASCII character, e.g. `"1"`. */
export const policyBytes = (char: string): Uint8Array =>
  new Uint8Array(28).fill(char.charCodeAt(0));

const ascii = (str: string): Uint8Array =>
  new Uint8Array([...str].map((c) => c.charCodeAt(0)));

export type TokenTable = Record<string, Record<string, number>>;

/** `{ "1": { Token1: 1 } }` → the multi-asset map primitive. */
export const multiAssetPrimitive = (table: TokenTable): Primitive =>
  Primitive.map(
    Object.entries(table).map(
      ([policy, tokens]): MapEntry => [
        Primitive.bytes(policyBytes(policy)),
        Primitive.map(
          Object.entries(tokens).map(
            ([name, quantity]): MapEntry => [
              Primitive.bytes(ascii(name)),
              Primitive.int(quantity),
            ],
          ),
        ),
      ],
    ),
  );

export const multiAsset = (table: TokenTable): MultiAsset =>
  MultiAsset.fromPrimitive(multiAssetPrimitive(table));

export const assetPrimitive = (tokens: Record<string, number>): Primitive =>
  Primitive.map(
    Object.entries(tokens).map(
      ([name, quantity]): MapEntry => [
        Primitive.bytes(ascii(name)),
        Primitive.int(quantity),
      ],
    ),
  );

export const valuePrimitive = (coin: number, table: TokenTable): Primitive =>
  Primitive.sequence([Primitive.int(coin), multiAssetPrimitive(table)]);
