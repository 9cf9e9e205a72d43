import type { AlignedPair, Sample } from "@/lib/types";
import { DEFAULT_CONFIG } from "@/config/deconflictionConfig";
import { assertPositive } from "@/lib/errors";

function* sweep(
  samplesA: Iterable<Sample>,
  samplesB: Iterable<Sample>,
  timeTolerance: number
): Generator<AlignedPair> {
  const bIter = samplesB[Symbol.iterator]();
  // b samples within tolerance of the current a sample, oldest first
  const window: Sample[] = [];
  let head = 0;
  // First b sample not yet admitted to the window
  let pending: Sample | null = null;
  let bDone = false;

  const nextB = (): Sample | null => {
    if (pending) return pending;
    if (bDone) return null;
    const res = bIter.next();
    if (res.done) {
      bDone = true;
      return null;
    }
    pending = res.value;
    return pending;
  };

  for (const a of samplesA) {
    // Drop b samples that fell behind a's tolerance window
    while (head < window.length && a.t - window[head].t > timeTolerance) head++;

    // Admit b samples up to a.t + tolerance, discarding ones already too old
    for (let b = nextB(); b && b.t - a.t <= timeTolerance; b = nextB()) {
      pending = null;
      if (a.t - b.t <= timeTolerance) window.push(b);
    }

    for (let i = head; i < window.length; i++) {
      yield { a, b: window[i] };
    }

    // Compact occasionally so the window does not grow with the whole trajectory
    if (head > 64 && head * 2 > window.length) {
      window.splice(0, head);
      head = 0;
    }
  }
}

/**
 * Pairs every sample of A with every sample of B whose timestamp is within
 * `timeTolerance` of it. Both inputs must be ordered by time. Runs as a
 * single merge-style sweep over the two sequences; trajectories whose time
 * windows never come within tolerance yield nothing.
 */
export function align(
  samplesA: Iterable<Sample>,
  samplesB: Iterable<Sample>,
  timeTolerance: number = DEFAULT_CONFIG.timeTolerance
): Iterable<AlignedPair> {
  assertPositive("timeTolerance", timeTolerance);
  return {
    [Symbol.iterator]: () => sweep(samplesA, samplesB, timeTolerance),
  };
}
