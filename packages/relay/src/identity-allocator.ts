import { randomInt } from "node:crypto";
import { RelayError } from "./errors.js";
import type { Identity } from "./types.js";

export const IDENTITY_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const IDENTITY_LENGTH = 6;

type IdentityAllocatorOptions = {
  /** Returns true when the identity must not be handed out. */
  isTaken: (id: Identity) => boolean;
  /** Number of identities currently taken. */
  takenCount: () => number;
  alphabet?: string;
  length?: number;
  maxAttempts?: number;
  /** Fraction of the namespace that may be in use before allocation refuses. */
  maxFill?: number;
  /** Uniform integer in [0, max). */
  randomIndex?: (max: number) => number;
};

export class IdentityAllocator {
  private readonly isTaken: (id: Identity) => boolean;
  private readonly takenCount: () => number;
  private readonly alphabet: string;
  private readonly length: number;
  private readonly maxAttempts: number;
  private readonly capacity: number;
  private readonly randomIndex: (max: number) => number;

  constructor(options: IdentityAllocatorOptions) {
    this.isTaken = options.isTaken;
    this.takenCount = options.takenCount;
    this.alphabet = options.alphabet ?? IDENTITY_ALPHABET;
    this.length = options.length ?? IDENTITY_LENGTH;
    this.maxAttempts = options.maxAttempts ?? 64;
    this.randomIndex = options.randomIndex ?? ((max) => randomInt(max));
    const namespace = Math.pow(this.alphabet.length, this.length);
    this.capacity = Math.floor(namespace * (options.maxFill ?? 0.9));
  }

  allocate(): Identity {
    if (this.takenCount() >= this.capacity) {
      throw new RelayError("ExhaustedNamespace", "No identities available");
    }

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.generate();
      if (!this.isTaken(candidate)) {
        return candidate;
      }
    }

    throw new RelayError(
      "ExhaustedNamespace",
      `No free identity after ${this.maxAttempts} attempts`
    );
  }

  private generate(): Identity {
    let id = "";
    for (let i = 0; i < this.length; i++) {
      id += this.alphabet.charAt(this.randomIndex(this.alphabet.length));
    }
    return id;
  }
}

