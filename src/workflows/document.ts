import { Data, Effect, Either, Option, Schema } from "effect";
import { Primitive } from "../codec/primitive.js";
import type { VerificationKey } from "../crypto/keys.js";
import type { ChainQueryError } from "../errors.js";
import type { TransactionId } from "../identifiers.js";
import {
  coseKeyHex,
  verifyEnvelope,
  type SignedEnvelope,
} from "../message-signing/envelope.js";
import { ChainContext } from "../services/chain-context.js";
import { ToolkitConfig } from "../services/config.js";
import { AuxiliaryData, METADATUM_MAX_LENGTH } from "../transaction/metadata.js";
import { splitIntoChunks } from "../utils.js";

const SIGNATURE_FIELD = "signature";

/**
 * `{ label: { documentHash: { signature: [chunk, ...] } } }`
 *
 * The envelope's `COSE_Sign1` hex is split into chunks that fit the
 * metadata string limit. The verifier is expected to know the signer's key,
 * so only the signature is stored.
 */
export const makeDocumentAuxiliaryData = (
  label: number,
  documentHash: string,
  envelope: SignedEnvelope,
): AuxiliaryData =>
  new AuxiliaryData([
    [
      label,
      Primitive.map([
        [
          Primitive.text(documentHash),
          Primitive.map([
            [
              Primitive.text(SIGNATURE_FIELD),
              Primitive.sequence(
                splitIntoChunks(envelope.signature, METADATUM_MAX_LENGTH).map(
                  Primitive.text,
                ),
              ),
            ],
          ]),
        ],
      ]),
    ],
  ]);

export type DocumentVerification = Data.TaggedEnum<{
  NoMetadata: {};
  LabelNotFound: { readonly label: number };
  DocumentNotFound: { readonly documentHash: string };
  SignatureMissing: { readonly documentHash: string };
  Verified: { readonly payload: string };
  Rejected: { readonly documentHash: string };
}>;
export const DocumentVerification = Data.taggedEnum<DocumentVerification>();

const LabelMetadataSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Unknown,
});

const DocumentEntrySchema = Schema.Struct({
  signature: Schema.Union(Schema.String, Schema.Array(Schema.String)),
});

export type VerifyDocumentInput = {
  readonly txId: TransactionId;
  readonly documentHash: string;
  readonly verificationKey: VerificationKey;
};

/**
 * Looks up the document attestation in the metadata of `txId` under the
 * configured label and checks its signature against `verificationKey`.
 * Only a failing chain query is an error; every other outcome is a
 * `DocumentVerification` case.
 */
export const verifyDocument = ({
  txId,
  documentHash,
  verificationKey,
}: VerifyDocumentInput): Effect.Effect<
  DocumentVerification,
  ChainQueryError,
  ChainContext | ToolkitConfig
> =>
  Effect.gen(function* () {
    const config = yield* ToolkitConfig;
    const chain = yield* ChainContext;
    const label = config.DOCUMENT_METADATA_LABEL;

    yield* Effect.logDebug(`Fetching metadata of ${txId.toHex()}`);
    const metadata = yield* chain.fetchMetadata(txId);
    if (Option.isNone(metadata)) {
      yield* Effect.logInfo(`No metadata on ${txId.toHex()}`);
      return DocumentVerification.NoMetadata();
    }

    const entry = metadata.value.find((e) => e.label === `${label}`);
    if (entry === undefined) {
      yield* Effect.logInfo(`${txId.toHex()} has no ${label} metadata label`);
      return DocumentVerification.LabelNotFound({ label });
    }

    const document = Schema.decodeUnknownOption(LabelMetadataSchema)(
      entry.jsonMetadata,
    ).pipe(
      Option.filter((docs) => Object.hasOwn(docs, documentHash)),
      Option.flatMap((docs) => Option.fromNullable(docs[documentHash])),
    );
    if (Option.isNone(document)) {
      yield* Effect.logInfo(`Document ${documentHash} not found`);
      return DocumentVerification.DocumentNotFound({ documentHash });
    }

    const signature = Schema.decodeUnknownEither(DocumentEntrySchema)(
      document.value,
    );
    if (Either.isLeft(signature)) {
      yield* Effect.logWarning(
        `Document ${documentHash} has no signature attribute`,
      );
      return DocumentVerification.SignatureMissing({ documentHash });
    }

    const chunks = signature.right.signature;
    const result = verifyEnvelope({
      signature: typeof chunks === "string" ? chunks : chunks.join(""),
      key: coseKeyHex(verificationKey),
    });
    if (!result.verified) {
      yield* Effect.logWarning(
        `Signature of document ${documentHash} does not verify`,
      );
      return DocumentVerification.Rejected({ documentHash });
    }
    yield* Effect.logInfo(`Document ${documentHash} verified`);
    return DocumentVerification.Verified({ payload: result.message });
  });
