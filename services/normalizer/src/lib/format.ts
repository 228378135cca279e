import type { NormalizationOutcome } from "@leveler/contracts";

export function formatLufs(lufs: number): string {
  return `${lufs.toFixed(1)} LUFS`;
}

export function formatDb(db: number): string {
  const sign = db > 0 ? "+" : "";
  return `${sign}${db.toFixed(1)} dB`;
}

/**
 * One-line report for an asset outcome, e.g.
 * "narration1.wav: -23.0 LUFS → -16.0 LUFS (+7.0 dB)"
 */
export function describeOutcome(outcome: NormalizationOutcome): string {
  switch (outcome.status) {
    case "success":
      return (
        `${outcome.name}: ${formatLufs(outcome.originalLufs)} → ` +
        `${formatLufs(outcome.targetLufs)} (${formatDb(outcome.gainDb)})`
      );
    case "skipped":
      return `${outcome.name}: skipped (${outcome.detail})`;
    case "failed":
      return `${outcome.name}: failed (${outcome.reason})`;
  }
}
