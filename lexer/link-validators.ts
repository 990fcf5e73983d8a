import {
  CharacterCodes,
  isDomainLabelCharacter,
  isEmailAtomCharacter
} from './character-codes.js';

/**
 * Syntactic checks used to accept `<...>` autolinks.
 * Neither check touches the network.
 */
export interface LinkValidator {
  isUrl(text: string): boolean;
  isEmail(text: string): boolean;
}

const MAX_LOCAL_PART_LENGTH = 64;
const MAX_DOMAIN_LENGTH = 254;
const MAX_LABEL_LENGTH = 63;

/** Absolute URL per the WHATWG URL parser. */
export function isAbsoluteUrl(text: string): boolean {
  return URL.canParse(text);
}

/**
 * Email address with a dot-atom local part and a hostname domain.
 * Quoted local parts and domain literals are not accepted.
 */
export function isEmailAddress(text: string): boolean {
  const at = text.lastIndexOf('@');
  if (at <= 0 || at === text.length - 1) return false;

  const local = text.slice(0, at);
  const domain = text.slice(at + 1);
  if (local.length > MAX_LOCAL_PART_LENGTH || domain.length > MAX_DOMAIN_LENGTH) return false;

  return isDotAtom(local) && isHostname(domain);
}

function isDotAtom(text: string): boolean {
  let prevDot = true; // a leading dot is rejected like a double dot
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === CharacterCodes.dot) {
      if (prevDot) return false;
      prevDot = true;
    } else if (isEmailAtomCharacter(ch)) {
      prevDot = false;
    } else {
      return false;
    }
  }
  return !prevDot;
}

function isHostname(text: string): boolean {
  const labels = text.split('.');
  for (const label of labels) {
    if (label.length === 0 || label.length > MAX_LABEL_LENGTH) return false;
    if (label.charCodeAt(0) === CharacterCodes.minus ||
        label.charCodeAt(label.length - 1) === CharacterCodes.minus)
      return false;
    for (let i = 0; i < label.length; i++) {
      if (!isDomainLabelCharacter(label.charCodeAt(i))) return false;
    }
  }
  return true;
}

export const defaultLinkValidator: LinkValidator = {
  isUrl: isAbsoluteUrl,
  isEmail: isEmailAddress,
};

/**
 * Merge caller overrides over the default validator.
 */
export function createLinkValidator(overrides?: Partial<LinkValidator>): LinkValidator {
  return {
    isUrl: overrides?.isUrl ?? defaultLinkValidator.isUrl,
    isEmail: overrides?.isEmail ?? defaultLinkValidator.isEmail,
  };
}
