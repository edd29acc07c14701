import {ValueOf} from "@chainsafe/ssz";
import * as ssz from "./sszTypes.js";

export type Bytes4 = ValueOf<typeof ssz.Bytes4>;
export type Bytes20 = ValueOf<typeof ssz.Bytes20>;
export type Bytes32 = ValueOf<typeof ssz.Bytes32>;
export type Bytes48 = ValueOf<typeof ssz.Bytes48>;
export type Bytes96 = ValueOf<typeof ssz.Bytes96>;
export type UintNum64 = ValueOf<typeof ssz.UintNum64>;
export type UintBn64 = ValueOf<typeof ssz.UintBn64>;
export type UintBn256 = ValueOf<typeof ssz.UintBn256>;

export type Slot = UintNum64;
export type Epoch = UintNum64;
export type SyncPeriod = UintNum64;
export type ValidatorIndex = UintNum64;
export type Root = Bytes32;
export type Version = Bytes4;
export type DomainType = Bytes4;
export type ForkDigest = Bytes4;
export type BLSPubkey = Bytes48;
export type BLSSignature = Bytes96;
export type Domain = Bytes32;
export type ExecutionAddress = Bytes20;
