import { Array as EffectArray, Option } from "effect";
import {
  CborSerializable,
  sequenceToPrimitive,
} from "../codec/serializable.js";
import {
  asBytes,
  asFixedSequence,
  asMap,
  asSafeUnsigned,
  asSetLike,
  Primitive,
  setLikePrimitive,
  type MapEntry,
} from "../codec/primitive.js";
import { Signature, VerificationKey } from "../crypto/keys.js";
import { DeserializeError } from "../errors.js";
import { copyBytes } from "../utils.js";

/** `[vkey, signature]` */
export class VerificationKeyWitness extends CborSerializable {
  readonly _tag = "VerificationKeyWitness";

  constructor(
    readonly vkey: VerificationKey,
    readonly signature: Signature,
  ) {
    super();
  }

  static fromPrimitive(
    value: Primitive,
    path = "vkey_witness",
  ): VerificationKeyWitness {
    const [vkey, signature] = asFixedSequence(value, 2, path);
    return new VerificationKeyWitness(
      VerificationKey.fromPrimitive(vkey, `${path}[0]`),
      Signature.fromPrimitive(signature, `${path}[1]`),
    );
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      this.vkey.toPrimitive(),
      this.signature.toPrimitive(),
    ]);
  }
}

export const WitnessSetKeys = {
  VkeyWitnesses: 0,
  NativeScripts: 1,
  BootstrapWitnesses: 2,
  PlutusV1Scripts: 3,
  PlutusData: 4,
  Redeemers: 5,
  PlutusV2Scripts: 6,
  PlutusV3Scripts: 7,
} as const;

/**
 * Everything except the verification-key witnesses is carried opaquely:
 * scripts as their flat bytes, the rest as primitives.
 */
export type TransactionWitnessSetFields = {
  readonly vkeyWitnesses?: ReadonlyArray<VerificationKeyWitness>;
  readonly nativeScripts?: ReadonlyArray<Primitive>;
  readonly bootstrapWitnesses?: ReadonlyArray<Primitive>;
  readonly plutusV1Scripts?: ReadonlyArray<Uint8Array>;
  readonly plutusData?: ReadonlyArray<Primitive>;
  readonly redeemers?: Primitive;
  readonly plutusV2Scripts?: ReadonlyArray<Uint8Array>;
  readonly plutusV3Scripts?: ReadonlyArray<Uint8Array>;
  /** Keys of the list fields that were read wrapped in the set tag. */
  readonly taggedSets?: ReadonlyArray<number>;
};

type MutableFields = {
  -readonly [K in keyof TransactionWitnessSetFields]?: TransactionWitnessSetFields[K];
};

const scriptsFromItems = (
  items: ReadonlyArray<Primitive>,
  path: string,
): Uint8Array[] => items.map((item, i) => asBytes(item, `${path}[${i}]`));

const copyScripts = (
  scripts: ReadonlyArray<Uint8Array> | undefined,
): Option.Option<ReadonlyArray<Uint8Array>> =>
  Option.fromNullable(scripts).pipe(Option.map((ss) => ss.map(copyBytes)));

export class TransactionWitnessSet extends CborSerializable {
  readonly _tag = "TransactionWitnessSet";
  readonly vkeyWitnesses: Option.Option<ReadonlyArray<VerificationKeyWitness>>;
  readonly nativeScripts: Option.Option<ReadonlyArray<Primitive>>;
  readonly bootstrapWitnesses: Option.Option<ReadonlyArray<Primitive>>;
  readonly plutusV1Scripts: Option.Option<ReadonlyArray<Uint8Array>>;
  readonly plutusData: Option.Option<ReadonlyArray<Primitive>>;
  readonly redeemers: Option.Option<Primitive>;
  readonly plutusV2Scripts: Option.Option<ReadonlyArray<Uint8Array>>;
  readonly plutusV3Scripts: Option.Option<ReadonlyArray<Uint8Array>>;
  readonly taggedSets: ReadonlySet<number>;

  constructor(fields: TransactionWitnessSetFields = {}) {
    super();
    this.vkeyWitnesses = Option.fromNullable(fields.vkeyWitnesses).pipe(
      Option.map((ws) => [...ws]),
    );
    this.nativeScripts = Option.fromNullable(fields.nativeScripts).pipe(
      Option.map((ss) => [...ss]),
    );
    this.bootstrapWitnesses = Option.fromNullable(
      fields.bootstrapWitnesses,
    ).pipe(Option.map((ws) => [...ws]));
    this.plutusV1Scripts = copyScripts(fields.plutusV1Scripts);
    this.plutusData = Option.fromNullable(fields.plutusData).pipe(
      Option.map((ds) => [...ds]),
    );
    this.redeemers = Option.fromNullable(fields.redeemers);
    this.plutusV2Scripts = copyScripts(fields.plutusV2Scripts);
    this.plutusV3Scripts = copyScripts(fields.plutusV3Scripts);
    this.taggedSets = new Set(fields.taggedSets);
  }

  static readonly empty = new TransactionWitnessSet();

  static fromPrimitive(
    value: Primitive,
    path = "transaction_witness_set",
  ): TransactionWitnessSet {
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
        case WitnessSetKeys.VkeyWitnesses:
          fields.vkeyWitnesses = setItems().map((item, i) =>
            VerificationKeyWitness.fromPrimitive(item, `${fieldPath}[${i}]`),
          );
          break;
        case WitnessSetKeys.NativeScripts:
          fields.nativeScripts = setItems();
          break;
        case WitnessSetKeys.BootstrapWitnesses:
          fields.bootstrapWitnesses = setItems();
          break;
        case WitnessSetKeys.PlutusV1Scripts:
          fields.plutusV1Scripts = scriptsFromItems(setItems(), fieldPath);
          break;
        case WitnessSetKeys.PlutusData:
          fields.plutusData = setItems();
          break;
        case WitnessSetKeys.Redeemers:
          fields.redeemers = v;
          break;
        case WitnessSetKeys.PlutusV2Scripts:
          fields.plutusV2Scripts = scriptsFromItems(setItems(), fieldPath);
          break;
        case WitnessSetKeys.PlutusV3Scripts:
          fields.plutusV3Scripts = scriptsFromItems(setItems(), fieldPath);
          break;
        default:
          throw new DeserializeError({
            message: `${path}: unsupported witness set field`,
            cause: `key=${key}`,
            path: fieldPath,
          });
      }
    }
    return new TransactionWitnessSet({ ...fields, taggedSets });
  }

  /** True when no field is present at all. */
  isEmpty(): boolean {
    return (
      Option.isNone(this.vkeyWitnesses) &&
      Option.isNone(this.nativeScripts) &&
      Option.isNone(this.bootstrapWitnesses) &&
      Option.isNone(this.plutusV1Scripts) &&
      Option.isNone(this.plutusData) &&
      Option.isNone(this.redeemers) &&
      Option.isNone(this.plutusV2Scripts) &&
      Option.isNone(this.plutusV3Scripts)
    );
  }

  /**
   * Number of vkey witnesses, bootstrap witnesses and scripts. A set whose
   * fields are all present but empty counts zero.
   */
  witnessCount(): number {
    const count = <A>(field: Option.Option<ReadonlyArray<A>>): number =>
      Option.match(field, { onNone: () => 0, onSome: (xs) => xs.length });
    return (
      count(this.vkeyWitnesses) +
      count(this.nativeScripts) +
      count(this.bootstrapWitnesses) +
      count(this.plutusV1Scripts) +
      count(this.plutusV2Scripts) +
      count(this.plutusV3Scripts)
    );
  }

  /** Copy with `witness` appended to the vkey witnesses. */
  withVkeyWitness(witness: VerificationKeyWitness): TransactionWitnessSet {
    return new TransactionWitnessSet({
      vkeyWitnesses: [
        ...Option.getOrElse(this.vkeyWitnesses, () => []),
        witness,
      ],
      nativeScripts: Option.getOrUndefined(this.nativeScripts),
      bootstrapWitnesses: Option.getOrUndefined(this.bootstrapWitnesses),
      plutusV1Scripts: Option.getOrUndefined(this.plutusV1Scripts),
      plutusData: Option.getOrUndefined(this.plutusData),
      redeemers: Option.getOrUndefined(this.redeemers),
      plutusV2Scripts: Option.getOrUndefined(this.plutusV2Scripts),
      plutusV3Scripts: Option.getOrUndefined(this.plutusV3Scripts),
      taggedSets: [...this.taggedSets],
    });
  }

  toPrimitive(): Primitive {
    const entry =
      (key: number) =>
      (value: Primitive): MapEntry => [Primitive.int(key), value];
    const set =
      (key: number) =>
      (items: ReadonlyArray<Primitive>): Primitive =>
        setLikePrimitive(items, this.taggedSets.has(key));
    const scripts = (key: number) => (ss: ReadonlyArray<Uint8Array>) =>
      set(key)(ss.map(Primitive.bytes));
    const K = WitnessSetKeys;
    return Primitive.map(
      EffectArray.getSomes([
        this.vkeyWitnesses.pipe(
          Option.map(sequenceToPrimitive),
          Option.map(set(K.VkeyWitnesses)),
          Option.map(entry(K.VkeyWitnesses)),
        ),
        this.nativeScripts.pipe(
          Option.map(set(K.NativeScripts)),
          Option.map(entry(K.NativeScripts)),
        ),
        this.bootstrapWitnesses.pipe(
          Option.map(set(K.BootstrapWitnesses)),
          Option.map(entry(K.BootstrapWitnesses)),
        ),
        this.plutusV1Scripts.pipe(
          Option.map(scripts(K.PlutusV1Scripts)),
          Option.map(entry(K.PlutusV1Scripts)),
        ),
        this.plutusData.pipe(
          Option.map(set(K.PlutusData)),
          Option.map(entry(K.PlutusData)),
        ),
        this.redeemers.pipe(Option.map(entry(K.Redeemers))),
        this.plutusV2Scripts.pipe(
          Option.map(scripts(K.PlutusV2Scripts)),
          Option.map(entry(K.PlutusV2Scripts)),
        ),
        this.plutusV3Scripts.pipe(
          Option.map(scripts(K.PlutusV3Scripts)),
          Option.map(entry(K.PlutusV3Scripts)),
        ),
      ]),
    );
  }
}
