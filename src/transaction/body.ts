import { Array as EffectArray, Option } from "effect";
import {
  CborSerializable,
  sequenceToPrimitive,
  type PrimitiveEncodable,
} from "../codec/serializable.js";
import {
  asBytes,
  asMap,
  asSafeUnsigned,
  asSequence,
  asSetLike,
  asUnsigned,
  Primitive,
  setLikePrimitive,
  type MapEntry,
} from "../codec/primitive.js";
import { DeserializeError } from "../errors.js";
import { computeHash32 } from "../hash.js";
import {
  AuxiliaryDataHash,
  ScriptDataHash,
  TransactionId,
  VerificationKeyHash,
} from "../identifiers.js";
import { copyBytes } from "../utils.js";
import { MultiAsset } from "../value/multi-asset.js";
import { TransactionInput } from "./input.js";
import { TransactionOutput } from "./output.js";

export const TransactionBodyKeys = {
  Inputs: 0,
  Outputs: 1,
  Fee: 2,
  Ttl: 3,
  Certificates: 4,
  Withdrawals: 5,
  Update: 6,
  AuxiliaryDataHash: 7,
  ValidityStart: 8,
  Mint: 9,
  ScriptDataHash: 11,
  Collateral: 13,
  RequiredSigners: 14,
  NetworkId: 15,
  CollateralReturn: 16,
  TotalCollateral: 17,
  ReferenceInputs: 18,
} as const;

export type Withdrawal = {
  readonly rewardAddress: Uint8Array;
  readonly amount: bigint;
};

/**
 * Construction input. Optional fields left `undefined` are absent from the
 * encoding; an empty list is *present* and encodes as `[]`.
 *
 * Certificates and protocol-parameter updates are carried as opaque
 * primitives.
 */
export type TransactionBodyFields = {
  readonly inputs: ReadonlyArray<TransactionInput>;
  readonly outputs: ReadonlyArray<TransactionOutput>;
  readonly fee: bigint;
  readonly ttl?: bigint;
  readonly certificates?: Primitive;
  readonly withdrawals?: ReadonlyArray<Withdrawal>;
  readonly update?: Primitive;
  readonly auxiliaryDataHash?: AuxiliaryDataHash;
  readonly validityStart?: bigint;
  readonly mint?: MultiAsset;
  readonly scriptDataHash?: ScriptDataHash;
  readonly collateral?: ReadonlyArray<TransactionInput>;
  readonly requiredSigners?: ReadonlyArray<VerificationKeyHash>;
  readonly networkId?: number;
  readonly collateralReturn?: TransactionOutput;
  readonly totalCollateral?: bigint;
  readonly referenceInputs?: ReadonlyArray<TransactionInput>;
  /** Keys of the list fields that were read wrapped in the set tag. */
  readonly taggedSets?: ReadonlyArray<number>;
};

type MutableFields = {
  -readonly [K in keyof TransactionBodyFields]?: TransactionBodyFields[K];
};

const inputsFromItems = (
  items: ReadonlyArray<Primitive>,
  path: string,
): TransactionInput[] =>
  items.map((item, i) =>
    TransactionInput.fromPrimitive(item, `${path}[${i}]`),
  );

const withdrawalsToPrimitive = (
  withdrawals: ReadonlyArray<Withdrawal>,
): Primitive =>
  Primitive.map(
    withdrawals.map(
      ({ rewardAddress, amount }): MapEntry => [
        Primitive.bytes(rewardAddress),
        Primitive.int(amount),
      ],
    ),
  );

const withdrawalsFromPrimitive = (
  value: Primitive,
  path: string,
): Withdrawal[] =>
  asMap(value, path).map(([k, v], i) => ({
    rewardAddress: asBytes(k, `${path}.<key ${i}>`),
    amount: asUnsigned(v, `${path}[${i}]`),
  }));

/**
 * The part of a transaction that is hashed and signed. Every optional field
 * is an `Option`; `None` fields are skipped by the encoder, which is what
 * makes two bodies with the same logical content encode identically.
 */
export class TransactionBody extends CborSerializable {
  readonly _tag = "TransactionBody";
  readonly inputs: ReadonlyArray<TransactionInput>;
  readonly outputs: ReadonlyArray<TransactionOutput>;
  readonly fee: bigint;
  readonly ttl: Option.Option<bigint>;
  readonly certificates: Option.Option<Primitive>;
  readonly withdrawals: Option.Option<ReadonlyArray<Withdrawal>>;
  readonly update: Option.Option<Primitive>;
  readonly auxiliaryDataHash: Option.Option<AuxiliaryDataHash>;
  readonly validityStart: Option.Option<bigint>;
  readonly mint: Option.Option<MultiAsset>;
  readonly scriptDataHash: Option.Option<ScriptDataHash>;
  readonly collateral: Option.Option<ReadonlyArray<TransactionInput>>;
  readonly requiredSigners: Option.Option<ReadonlyArray<VerificationKeyHash>>;
  readonly networkId: Option.Option<number>;
  readonly collateralReturn: Option.Option<TransactionOutput>;
  readonly totalCollateral: Option.Option<bigint>;
  readonly referenceInputs: Option.Option<ReadonlyArray<TransactionInput>>;
  readonly taggedSets: ReadonlySet<number>;
  #hash: TransactionId | undefined;

  constructor(fields: TransactionBodyFields) {
    super();
    this.inputs = [...fields.inputs];
    this.outputs = [...fields.outputs];
    this.fee = fields.fee;
    this.ttl = Option.fromNullable(fields.ttl);
    this.certificates = Option.fromNullable(fields.certificates);
    this.withdrawals = Option.fromNullable(fields.withdrawals).pipe(
      Option.map((ws) =>
        ws.map((w) => ({
          rewardAddress: copyBytes(w.rewardAddress),
          amount: w.amount,
        })),
      ),
    );
    this.update = Option.fromNullable(fields.update);
    this.auxiliaryDataHash = Option.fromNullable(fields.auxiliaryDataHash);
    this.validityStart = Option.fromNullable(fields.validityStart);
    this.mint = Option.fromNullable(fields.mint);
    this.scriptDataHash = Option.fromNullable(fields.scriptDataHash);
    this.collateral = Option.fromNullable(fields.collateral).pipe(
      Option.map((inputs) => [...inputs]),
    );
    this.requiredSigners = Option.fromNullable(fields.requiredSigners).pipe(
      Option.map((signers) => [...signers]),
    );
    this.networkId = Option.fromNullable(fields.networkId);
    this.collateralReturn = Option.fromNullable(fields.collateralReturn);
    this.totalCollateral = Option.fromNullable(fields.totalCollateral);
    this.referenceInputs = Option.fromNullable(fields.referenceInputs).pipe(
      Option.map((inputs) => [...inputs]),
    );
    this.taggedSets = new Set(fields.taggedSets);
  }

  static fromPrimitive(
    value: Primitive,
    path = "transaction_body",
  ): TransactionBody {
    const fields: MutableFields = {};
    const taggedSets: number[] = [];
    for (const [k, v] of asMap(value, path)) {
      const key = asSafeUnsigned(k, `${path}.<key>`);
      const fieldPath = `${path}{${key}}`;
      const setItems = (): ReadonlyArray<Primitive> => {
        const { items, tagged } = asSetLike(v, fieldPath);
        if (tagged) taggedSets.push(key);
        return items;
      };
      switch (key) {
        case TransactionBodyKeys.Inputs:
          fields.inputs = inputsFromItems(setItems(), fieldPath);
          break;
        case TransactionBodyKeys.Outputs:
          fields.outputs = asSequence(v, fieldPath).map((item, i) =>
            TransactionOutput.fromPrimitive(item, `${fieldPath}[${i}]`),
          );
          break;
        case TransactionBodyKeys.Fee:
          fields.fee = asUnsigned(v, fieldPath);
          break;
        case TransactionBodyKeys.Ttl:
          fields.ttl = asUnsigned(v, fieldPath);
          break;
        case TransactionBodyKeys.Certificates:
          fields.certificates = v;
          break;
        case TransactionBodyKeys.Withdrawals:
          fields.withdrawals = withdrawalsFromPrimitive(v, fieldPath);
          break;
        case TransactionBodyKeys.Update:
          fields.update = v;
          break;
        case TransactionBodyKeys.AuxiliaryDataHash:
          fields.auxiliaryDataHash = AuxiliaryDataHash.fromPrimitive(
            v,
            fieldPath,
          );
          break;
        case TransactionBodyKeys.ValidityStart:
          fields.validityStart = asUnsigned(v, fieldPath);
          break;
        case TransactionBodyKeys.Mint:
          fields.mint = MultiAsset.fromPrimitive(v, fieldPath);
          break;
        case TransactionBodyKeys.ScriptDataHash:
          fields.scriptDataHash = ScriptDataHash.fromPrimitive(v, fieldPath);
          break;
        case TransactionBodyKeys.Collateral:
          fields.collateral = inputsFromItems(setItems(), fieldPath);
          break;
        case TransactionBodyKeys.RequiredSigners:
          fields.requiredSigners = setItems().map((item, i) =>
            VerificationKeyHash.fromPrimitive(item, `${fieldPath}[${i}]`),
          );
          break;
        case TransactionBodyKeys.NetworkId:
          fields.networkId = asSafeUnsigned(v, fieldPath);
          break;
        case TransactionBodyKeys.CollateralReturn:
          fields.collateralReturn = TransactionOutput.fromPrimitive(
            v,
            fieldPath,
          );
          break;
        case TransactionBodyKeys.TotalCollateral:
          fields.totalCollateral = asUnsigned(v, fieldPath);
          break;
        case TransactionBodyKeys.ReferenceInputs:
          fields.referenceInputs = inputsFromItems(setItems(), fieldPath);
          break;
        default:
          throw new DeserializeError({
            message: `${path}: unsupported transaction body field`,
            cause: `key=${key}`,
            path: fieldPath,
          });
      }
    }
    const { inputs, outputs, fee } = fields;
    if (inputs === undefined || outputs === undefined || fee === undefined) {
      throw new DeserializeError({
        message: `${path} must contain inputs, outputs and fee`,
        cause: `present keys: ${Object.keys(fields).join(", ")}`,
        path,
      });
    }
    return new TransactionBody({
      ...fields,
      inputs,
      outputs,
      fee,
      taggedSets,
    });
  }

  toPrimitive(): Primitive {
    const entry =
      (key: number) =>
      (value: Primitive): MapEntry => [Primitive.int(key), value];
    const set =
      (key: number) =>
      (items: ReadonlyArray<PrimitiveEncodable>): Primitive =>
        setLikePrimitive(sequenceToPrimitive(items), this.taggedSets.has(key));
    const K = TransactionBodyKeys;
    return Primitive.map([
      entry(K.Inputs)(set(K.Inputs)(this.inputs)),
      entry(K.Outputs)(
        Primitive.sequence(this.outputs.map((output) => output.toPrimitive())),
      ),
      entry(K.Fee)(Primitive.int(this.fee)),
      ...EffectArray.getSomes([
        this.ttl.pipe(Option.map(Primitive.int), Option.map(entry(K.Ttl))),
        this.certificates.pipe(Option.map(entry(K.Certificates))),
        this.withdrawals.pipe(
          Option.map(withdrawalsToPrimitive),
          Option.map(entry(K.Withdrawals)),
        ),
        this.update.pipe(Option.map(entry(K.Update))),
        this.auxiliaryDataHash.pipe(
          Option.map((hash) => hash.toPrimitive()),
          Option.map(entry(K.AuxiliaryDataHash)),
        ),
        this.validityStart.pipe(
          Option.map(Primitive.int),
          Option.map(entry(K.ValidityStart)),
        ),
        this.mint.pipe(
          Option.map((mint) => mint.toPrimitive()),
          Option.map(entry(K.Mint)),
        ),
        this.scriptDataHash.pipe(
          Option.map((hash) => hash.toPrimitive()),
          Option.map(entry(K.ScriptDataHash)),
        ),
        this.collateral.pipe(
          Option.map(set(K.Collateral)),
          Option.map(entry(K.Collateral)),
        ),
        this.requiredSigners.pipe(
          Option.map(set(K.RequiredSigners)),
          Option.map(entry(K.RequiredSigners)),
        ),
        this.networkId.pipe(
          Option.map(Primitive.int),
          Option.map(entry(K.NetworkId)),
        ),
        this.collateralReturn.pipe(
          Option.map((output) => output.toPrimitive()),
          Option.map(entry(K.CollateralReturn)),
        ),
        this.totalCollateral.pipe(
          Option.map(Primitive.int),
          Option.map(entry(K.TotalCollateral)),
        ),
        this.referenceInputs.pipe(
          Option.map(set(K.ReferenceInputs)),
          Option.map(entry(K.ReferenceInputs)),
        ),
      ]),
    ]);
  }

  /**
   * blake2b-256 of the canonical body bytes. This is both the transaction id
   * and the message every witness signs. Bodies are immutable, so the result
   * is cached.
   */
  hash(): TransactionId {
    if (this.#hash === undefined) {
      this.#hash = new TransactionId(computeHash32(this.toCbor()));
    }
    return this.#hash;
  }
}
