// Normalized app name -> official download page
const VENDOR_URLS: ReadonlyMap<string, string> = new Map([
  ['github-desktop', 'https://desktop.github.com'],
  ['visual-studio-code', 'https://code.visualstudio.com'],
  ['chrome', 'https://www.google.com/chrome'],
  ['firefox', 'https://www.mozilla.org/firefox'],
  ['vlc', 'https://www.videolan.org'],
  ['discord', 'https://discord.com/download'],
  ['telegram', 'https://telegram.org'],
  ['whatsapp', 'https://www.whatsapp.com/download'],
  ['slack', 'https://slack.com/downloads'],
  ['zoom', 'https://zoom.us/download'],
]);

/** Written in place of a URL when the vendor table has no entry. */
export const NOT_FOUND_URL = 'Not found';

export const lookupVendor = (normalized: string): string | undefined =>
  VENDOR_URLS.get(normalized.toLowerCase());
