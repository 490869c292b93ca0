import { isTextual, type RoomMessage } from '../matrix';

export const ARTIFACT_KINDS = ['qr', 'pairing-code', 'login-url'] as const;
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/** What the bot posted, before any media is fetched. */
export type RawArtifact =
  | { kind: 'qr'; mxcUrl: string; mimetype?: string }
  | { kind: 'pairing-code'; code: string }
  | { kind: 'login-url'; url: string };

/** What the caller shows the user to finish pairing. */
export type PairingArtifact =
  | { kind: 'qr'; dataUrl: string }
  | { kind: 'pairing-code'; code: string }
  | { kind: 'login-url'; url: string };

const PAIRING_CODE = /([A-Z0-9]{4}-[A-Z0-9]{4})/;
const MARKDOWN_LINK = /\((https?:\/\/[^)]+)\)/;

// the bot's instructions precede the code and may carry code-shaped examples
const PAIRING_INSTRUCTIONS = 'Input the pairing code';

// bots wrap codes in markdown emphasis or inline code
const stripFormatting = (body: string) => body.replace(/[`*]/g, '');

export const extractPairingCode = (body: string): string | undefined =>
  PAIRING_CODE.exec(stripFormatting(body))?.[1];

export const extractLoginUrl = (body: string): string | undefined =>
  MARKDOWN_LINK.exec(body)?.[1];

/**
 * Looks for a pairing artifact of one of the accepted kinds in a bot message.
 */
export const extractArtifact = (
  message: RoomMessage,
  accepts: readonly ArtifactKind[]
): RawArtifact | undefined => {
  if (message.kind === 'image') {
    if (!accepts.includes('qr') || !message.url) return;

    return { kind: 'qr', mxcUrl: message.url, mimetype: message.mimetype };
  }

  if (!isTextual(message)) return;

  if (accepts.includes('pairing-code') && !message.body.includes(PAIRING_INSTRUCTIONS)) {
    const code = extractPairingCode(message.body);
    if (code) return { kind: 'pairing-code', code };
  }

  if (accepts.includes('login-url')) {
    const url = extractLoginUrl(message.body);
    if (url) return { kind: 'login-url', url };
  }
};

export const toDataUrl = (data: Uint8Array, contentType: string) =>
  `data:${contentType};base64,${Buffer.from(data).toString('base64')}`;
