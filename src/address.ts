import { Option } from "effect";
import { InvalidOperationError } from "./errors.js";
import { VerificationKeyHash } from "./identifiers.js";

/**
 * Shelley address headers: the high nibble is the address type, the low
 * nibble the network id. Types 0-7 carry the payment credential in bytes
 * 1..29; an even type means that credential is a key hash.
 */
const ENTERPRISE_KEY_TYPE = 0x6;
const LAST_SHELLEY_TYPE = 0x7;
const CREDENTIAL_OFFSET = 1;

export const enterpriseAddress = (
  paymentKeyHash: VerificationKeyHash,
  networkId: number,
): Uint8Array => {
  if (!Number.isInteger(networkId) || networkId < 0 || networkId > 0xf) {
    throw new InvalidOperationError({
      message: "Network id must fit in four bits",
      cause: networkId,
    });
  }
  const address = new Uint8Array(CREDENTIAL_OFFSET + VerificationKeyHash.SIZE);
  address[0] = (ENTERPRISE_KEY_TYPE << 4) | networkId;
  address.set(paymentKeyHash.bytes, CREDENTIAL_OFFSET);
  return address;
};

export const addressNetworkId = (address: Uint8Array): Option.Option<number> =>
  address.length === 0 ? Option.none() : Option.some(address[0] & 0x0f);

/** `None` for script-locked, reward and bootstrap addresses. */
export const paymentKeyHash = (
  address: Uint8Array,
): Option.Option<VerificationKeyHash> => {
  if (address.length < CREDENTIAL_OFFSET + VerificationKeyHash.SIZE) {
    return Option.none();
  }
  const type = address[0] >> 4;
  if (type > LAST_SHELLEY_TYPE || type % 2 === 1) return Option.none();
  return Option.some(
    new VerificationKeyHash(
      address.subarray(
        CREDENTIAL_OFFSET,
        CREDENTIAL_OFFSET + VerificationKeyHash.SIZE,
      ),
    ),
  );
};
