import type { Track } from '../player/playerTypes';

/**
 * Wire text for `trk` messages. Payloads are JSON objects so subscribers can pick fields
 * without parsing free text; missing values are empty strings.
 */

export interface TrackDescription {
  title: string;
  artist: string;
  album: string;
  uri: string;
}

export interface TrackFormatter {
  describeTrack(track: Track): string;
  describeStream(title: string): string;
}

const STREAM_TITLE_SEPARATOR = ' - ';

/** Builds the description of a track; the title falls back to the URI. */
export function trackDescription(track: Track): TrackDescription {
  return {
    title: track.name || track.uri,
    artist: track.artists.join(', '),
    album: track.album ?? '',
    uri: track.uri,
  };
}

/**
 * Splits a raw stream title on the first "artist - title" separator.
 * Returns undefined for blank titles.
 */
export function parseStreamTitle(raw: string): TrackDescription | undefined {
  const text = raw.trim();
  if (!text) return undefined;

  const separator = text.indexOf(STREAM_TITLE_SEPARATOR);
  if (separator <= 0) {
    return { title: text, artist: '', album: '', uri: '' };
  }

  return {
    title: text.slice(separator + STREAM_TITLE_SEPARATOR.length).trim(),
    artist: text.slice(0, separator).trim(),
    album: '',
    uri: '',
  };
}

export function describeTrack(track: Track): string {
  return JSON.stringify(trackDescription(track));
}

/** Blank stream titles describe to an empty payload. */
export function describeStream(title: string): string {
  const description = parseStreamTitle(title);
  return description ? JSON.stringify(description) : '';
}

export const defaultTrackFormatter: TrackFormatter = { describeTrack, describeStream };
