import { keccak_256 as keccak } from "@noble/hashes/sha3";
import type { XTRequest } from "../core/types";
import { bytesToHex } from "../utils/bytes";
import { encodeXTRequest } from "./message";

/** keccak-256 over the encoded request; only used to correlate log lines. */
export const xtDigest = (x: XTRequest): `0x${string}` => bytesToHex(keccak(encodeXTRequest(x)));
