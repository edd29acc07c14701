/**
 * Fork code name in order of occurrence
 */
export enum ForkName {
  phase0 = "phase0",
  altair = "altair",
  bellatrix = "bellatrix",
  capella = "capella",
  deneb = "deneb",
  electra = "electra",
}

/**
 * Fork sequence number in order of occurrence
 */
export enum ForkSeq {
  phase0 = 0,
  altair = 1,
  bellatrix = 2,
  capella = 3,
  deneb = 4,
  electra = 5,
}

export const forkAll = Object.values(ForkName);

export function highestFork<F extends ForkName>(forkNames: F[]): F {
  let highest = forkNames[0];

  for (const forkName of forkNames) {
    if (ForkSeq[forkName] > ForkSeq[highest]) {
      highest = forkName;
    }
  }

  return highest;
}

export type ForkPreExecution = ForkName.phase0 | ForkName.altair | ForkName.bellatrix;
/** Forks whose light-client header commits to an execution payload header */
export type ForkExecutionHeader = Exclude<ForkName, ForkPreExecution>;
export function isForkExecutionHeader(fork: ForkName): fork is ForkExecutionHeader {
  return ForkSeq[fork] >= ForkSeq.capella;
}

export type ForkPreBlobs = ForkPreExecution | ForkName.capella;
export type ForkBlobs = Exclude<ForkName, ForkPreBlobs>;
export function isForkBlobs(fork: ForkName): fork is ForkBlobs {
  return ForkSeq[fork] >= ForkSeq.deneb;
}

export type ForkPostElectra = ForkName.electra;
export function isForkPostElectra(fork: ForkName): fork is ForkPostElectra {
  return ForkSeq[fork] >= ForkSeq.electra;
}
