import { z } from 'zod';

export const trackMetadataSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  runtimeSeconds: z.number().int().nonnegative(),
  runtimeDisplay: z.string(),
});

export type TrackMetadata = z.infer<typeof trackMetadataSchema>;

const pad = (value: number) => value.toString().padStart(2, '0');

/** `M:SS` below an hour, `H:MM:SS` from an hour up. */
export function formatRuntime(totalSeconds: number): string {
  const seconds = Number.isFinite(totalSeconds) && totalSeconds > 0 ? Math.floor(totalSeconds) : 0;
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(rest)}` : `${minutes}:${pad(rest)}`;
}

export function buildTrackMetadata(url: string, title: string | undefined, durationSeconds: number | undefined): TrackMetadata {
  const runtimeSeconds = durationSeconds && durationSeconds > 0 ? Math.floor(durationSeconds) : 0;
  return {
    url,
    title: title && title.trim().length > 0 ? title : url,
    runtimeSeconds,
    runtimeDisplay: formatRuntime(runtimeSeconds),
  };
}
