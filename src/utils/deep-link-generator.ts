/**
 * Deep Link Generator
 * Builds the human-facing marketplace links shown in alerts and opened in the browser
 */

type DeepLinkParams =
  | { kind: 'block'; blockId: string; quantity: number }
  | { kind: 'event'; eventId: string };

/**
 * Generate a link relative to the marketplace web root
 */
export function generateDeepLink(baseUrl: string, params: DeepLinkParams): string {
  const root = baseUrl.replace(/\/+$/, '');

  switch (params.kind) {
    case 'block':
      return generateBlockLink(root, params.blockId, params.quantity);

    case 'event':
      return `${root}/event/${encodeURIComponent(params.eventId)}`;
  }
}

/**
 * Purchase page for a block of tickets
 * Format: {root}/app/block/{blockId},{quantity}
 */
function generateBlockLink(root: string, blockId: string, quantity: number): string {
  return `${root}/app/block/${encodeURIComponent(blockId)},${quantity}`;
}

/**
 * Validate that a link points at the configured marketplace over http(s)
 */
export function validateDeepLink(link: string, baseUrl: string): boolean {
  try {
    const url = new URL(link);
    const expected = new URL(baseUrl);

    return (
      (url.protocol === 'https:' || url.protocol === 'http:') &&
      url.hostname.replace(/^www\./, '') === expected.hostname.replace(/^www\./, '')
    );
  } catch {
    return false;
  }
}
