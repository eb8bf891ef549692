/**
 * Decides whether a metadata pair describes an advertisement.
 */
export type AdClassifier = (artist: string, title: string) => boolean;

// Observed on the desktop client: ads carry no artist and one of these titles.
const AD_TITLES = new Set(['Advertisement', 'Spotify']);

export const classifyIsAd: AdClassifier = (artist, title) =>
  artist === '' && AD_TITLES.has(title);
