import type { ContactRecord } from '../types/index.js';

/** Split a multi-contact vCard file into individual vCard strings. */
export function splitVCards(raw: string): string[] {
  const cards: string[] = [];
  const lines = raw.split(/\r?\n/);
  let current: string[] = [];
  let inCard = false;

  for (const line of lines) {
    if (line.toUpperCase().startsWith('BEGIN:VCARD')) {
      inCard = true;
      current = [line];
    } else if (line.toUpperCase().startsWith('END:VCARD')) {
      current.push(line);
      if (inCard) cards.push(current.join('\r\n'));
      inCard = false;
      current = [];
    } else if (inCard) {
      current.push(line);
    }
  }

  return cards;
}

/**
 * Parse a single vCard (3.0 or 4.0) into the fields used for matching.
 * The structured N property wins over FN, which is only split when N is absent.
 */
export function vcardToRecord(vcard: string): ContactRecord {
  const props = parseProperties(unfoldLines(vcard));

  const nValue = props.get('N');
  let givenName = '';
  let familyName = '';
  if (nValue !== undefined) {
    const nParts = splitStructured(nValue);
    familyName = nParts[0] ?? '';
    givenName = nParts[1] ?? '';
  } else {
    const fn = unescapeVCardValue(props.get('FN') ?? '').trim();
    const space = fn.indexOf(' ');
    givenName = space === -1 ? fn : fn.slice(0, space);
    familyName = space === -1 ? '' : fn.slice(space + 1).trim();
  }

  const orgValue = props.get('ORG');

  return {
    givenName: givenName.trim(),
    familyName: familyName.trim(),
    organizationName: orgValue ? (splitStructured(orgValue)[0] ?? '').trim() : '',
    phones: props.getAll('TEL').map(p => stripUriScheme(unescapeVCardValue(p.value), 'tel:')),
    emails: props.getAll('EMAIL').map(p => stripUriScheme(unescapeVCardValue(p.value), 'mailto:')),
  };
}

export function parseVCardFile(raw: string): ContactRecord[] {
  return splitVCards(raw).map(vcardToRecord);
}

// --- Helpers ---

interface VCardProperty {
  name: string;
  params: string[];
  value: string;
}

class PropertyMap {
  private entries: VCardProperty[] = [];

  add(prop: VCardProperty): void {
    this.entries.push(prop);
  }

  get(name: string): string | undefined {
    return this.entries.find(e => e.name === name.toUpperCase())?.value;
  }

  getAll(name: string): VCardProperty[] {
    return this.entries.filter(e => e.name === name.toUpperCase());
  }
}

function parseProperties(lines: string[]): PropertyMap {
  const map = new PropertyMap();
  for (const line of lines) {
    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;
    const left = line.substring(0, colonIdx);
    const value = line.substring(colonIdx + 1);

    const parts = left.split(';');
    // Apple groups properties as "item1.TEL"
    const name = parts[0].replace(/^[^.]*\./, '').toUpperCase();
    const params = parts.slice(1);

    if (name === 'BEGIN' || name === 'END') continue;

    map.add({ name, params, value });
  }
  return map;
}

/** Split on unescaped semicolons, then unescape each component. */
function splitStructured(value: string): string[] {
  return value.split(/(?<!\\);/).map(unescapeVCardValue);
}

function stripUriScheme(value: string, scheme: string): string {
  return value.toLowerCase().startsWith(scheme) ? value.slice(scheme.length) : value;
}

function unescapeVCardValue(value: string): string {
  return value
    .replace(/\\n/gi, '\n')
    .replace(/\\,/g, ',')
    .replace(/\\;/g, ';')
    .replace(/\\\\/g, '\\');
}

/** Unfold continuation lines (lines starting with space or tab). */
function unfoldLines(text: string): string[] {
  const raw = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const result: string[] = [];
  for (const line of raw) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && result.length > 0) {
      result[result.length - 1] += line.substring(1);
    } else {
      result.push(line);
    }
  }
  return result.filter(l => l.length > 0);
}
