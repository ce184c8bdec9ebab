import type { ExtractionConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import type { ContactInfo } from '../types/index.js';

/** Read access to a rendered contact card. */
export interface CardHandle {
  innerText(): Promise<string>;
  linkTargets(): Promise<string[]>;
}

type LabeledField = keyof ExtractionConfig['labels'];
type MutableContact = { -readonly [K in keyof ContactInfo]: ContactInfo[K] };

const EMAIL_PATTERN = /[\w.+-]+@[\w.-]+\.[a-z]{2,}/gi;
const SIP_URI_PATTERN = /sip:[\w.+-]+@[\w.-]+/gi;
const SIP_VALID_PATTERN = /^sip:[\w.+-]+@[\w.-]+\.[a-z]{2,}$/i;
const POSTCODE_LINE_PATTERN = /\d{5}\s+[A-Z]/;
const NINE_DIGITS_PATTERN = /(?<!\d)\d{9}(?!\d)/;
const SHORT_NUMBER_PATTERN = /(?<!\d)\d{6,8}(?!\d)/;
const POSTAL_ADDRESS_PATTERN = /\d{5}[ \t]+[A-ZÁÉÍÓÚÑ][A-ZÁÉÍÓÚÑ\- \t]*/;
const NAME_PATTERN =
  /[A-ZÁÉÍÓÚÑ][A-Za-zÁÉÍÓÚÑáéíóúñ\-. \t]+,[ \t]*[A-ZÁÉÍÓÚÑ][A-Za-zÁÉÍÓÚÑáéíóúñ\- \t]+/;
const UPPERCASE_LETTER = /[A-ZÁÉÍÓÚÑ]/;
const PHONE_NOISE = /[^\d+\-() ]/g;
const NAME_SCAN_LINES = 10;
const PHONE_LABEL_REACH = 2;
const ADDRESS_MAX_LINES = 3;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function emptyContact(): MutableContact {
  return {
    name: null,
    personalEmail: null,
    phone: null,
    sip: null,
    address: null,
    department: null,
    company: null,
    officeLocation: null,
  };
}

/** Percent-decodes a link target, keeping the raw text when it holds a stray `%`. */
function decodeLink(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    if (err instanceof URIError) return value;
    throw err;
  }
}

function cleanPhone(value: string): string | null {
  const cleaned = value.replace(PHONE_NOISE, '').trim();
  return /\d/.test(cleaned) ? cleaned : null;
}

interface LabelMatch {
  field: LabeledField;
  inline: string;
}

/**
 * Turns the text of a directory contact card into structured fields.
 *
 * Labeled values ("Trabajo:", "Departamento:", ...) are read first. Anything
 * still missing is recovered from free text with patterns. Labeled values win.
 */
export class ContactExtractor {
  private readonly labelPatterns: Array<{ field: LabeledField; pattern: RegExp }>;
  private readonly genericEmailPattern: RegExp | null;
  private readonly streetAddressPattern: RegExp;
  private readonly headings: Set<string>;
  private readonly placeholders: Set<string>;

  constructor(
    private readonly config: ExtractionConfig,
    private readonly logger?: Logger
  ) {
    this.labelPatterns = [];
    for (const [field, labels] of Object.entries(config.labels)) {
      if (!isLabeledField(field)) continue;
      for (const label of labels) {
        this.labelPatterns.push({
          field,
          pattern: new RegExp(`^${escapeRegExp(label)}\\s*(?::\\s*(.*))?$`, 'i'),
        });
      }
    }

    this.genericEmailPattern =
      config.genericEmailPrefixes.length > 0
        ? new RegExp(`^(${config.genericEmailPrefixes.map(escapeRegExp).join('|')})\\d+@`, 'i')
        : null;

    this.streetAddressPattern = new RegExp(
      `${escapeRegExp(config.streetMarker)}[ \\t]*[A-ZÁÉÍÓÚÑ \\t,]+\\d+[ \\t]+\\d{5}[ \\t]+[A-ZÁÉÍÓÚÑ\\- \\t]+`,
      'i'
    );
    this.headings = new Set(config.sectionHeadings.map((heading) => heading.toUpperCase()));
    this.placeholders = new Set(config.placeholderValues.map((value) => value.toLowerCase()));
  }

  /**
   * Shared mailbox addresses such as ASP164@... that say nothing about a person.
   */
  isGenericEmail(email: string): boolean {
    return this.genericEmailPattern?.test(email.trim()) ?? false;
  }

  /**
   * SUCCESS when the card carries anything that identifies a person.
   * A lone generic mailbox address does not.
   */
  classify(info: ContactInfo): 'SUCCESS' | 'NOT_FOUND' {
    const personalEmail = info.personalEmail !== null && !this.isGenericEmail(info.personalEmail);
    const useful =
      info.sip !== null ||
      personalEmail ||
      info.phone !== null ||
      (info.name !== null && info.personalEmail !== null) ||
      info.address !== null ||
      info.department !== null;
    return useful ? 'SUCCESS' : 'NOT_FOUND';
  }

  /**
   * Read a rendered card. Returns null when its text cannot be read at all.
   */
  async extractFromCard(card: CardHandle): Promise<ContactInfo | null> {
    let text: string;
    try {
      text = await card.innerText();
    } catch (err) {
      this.logger?.warn({ err }, 'Card text could not be read');
      return null;
    }

    let links: string[] = [];
    try {
      links = await card.linkTargets();
    } catch (err) {
      this.logger?.debug({ err }, 'Card links could not be read');
    }

    return this.extract(text, links);
  }

  extract(text: string, links: readonly string[] = []): ContactInfo {
    const lines = text.split(/\r?\n/).map((line) => line.trim());
    const contact = emptyContact();

    this.readLabels(lines, contact);
    this.readLinks(links, contact);
    this.readFreeText(text, lines, contact);

    return Object.freeze(contact);
  }

  private matchLabel(line: string): LabelMatch | null {
    for (const { field, pattern } of this.labelPatterns) {
      const match = line.match(pattern);
      if (match) {
        return { field, inline: (match[1] ?? '').trim() };
      }
    }
    return null;
  }

  private isHeading(line: string): boolean {
    return this.headings.has(line.toUpperCase());
  }

  private readLabels(lines: string[], contact: MutableContact): void {
    for (let i = 0; i < lines.length; i++) {
      const label = this.matchLabel(lines[i]);
      if (!label || contact[label.field] !== null) continue;

      if (label.field === 'address') {
        const parts = label.inline ? [label.inline] : [];
        for (let j = i + 1; j < lines.length && j <= i + ADDRESS_MAX_LINES; j++) {
          const next = lines[j];
          if (!next || this.matchLabel(next) || this.isHeading(next)) break;
          parts.push(next);
        }
        if (parts.length > 0) contact.address = parts.join(' ');
        continue;
      }

      const value = label.inline || this.valueBelow(lines, i);
      if (!value || this.placeholders.has(value.toLowerCase())) continue;

      switch (label.field) {
        case 'phone':
          contact.phone = cleanPhone(value);
          break;
        case 'sip':
          if (value.toLowerCase().startsWith('sip:')) {
            contact.sip = value.split(/\s+/)[0];
          }
          break;
        default:
          contact[label.field] = value;
      }
    }
  }

  /** Next non-empty line, unless that line is itself a label. */
  private valueBelow(lines: string[], index: number): string | null {
    for (let j = index + 1; j < lines.length; j++) {
      if (!lines[j]) continue;
      return this.matchLabel(lines[j]) ? null : lines[j];
    }
    return null;
  }

  private readLinks(links: readonly string[], contact: MutableContact): void {
    for (const href of links) {
      const target = href.trim();
      const lower = target.toLowerCase();

      if (lower.startsWith('mailto:') && contact.personalEmail === null) {
        const email = decodeLink(target.slice('mailto:'.length).split('?')[0]).trim();
        if (email.includes('@') && !this.isGenericEmail(email)) {
          contact.personalEmail = email;
        }
      } else if (lower.startsWith('tel:') && contact.phone === null) {
        contact.phone = cleanPhone(decodeLink(target.slice('tel:'.length)));
      }
    }
  }

  private readFreeText(text: string, lines: string[], contact: MutableContact): void {
    contact.personalEmail ??= this.findEmail(text);
    contact.phone ??= this.findPhone(lines);
    contact.sip ??= this.findSip(text);
    contact.address ??= this.findAddress(text, lines);

    const nameIndex = this.findNameLine(lines);
    if (nameIndex !== null) {
      contact.name ??= this.nameFromLine(lines[nameIndex]);
    }
    contact.department ??= this.findDepartment(lines, nameIndex);
  }

  private findEmail(text: string): string | null {
    // sip:user@host is a messaging identity, not a mailbox
    const withoutSip = text.replace(SIP_URI_PATTERN, ' ');
    const candidates = withoutSip.match(EMAIL_PATTERN) ?? [];
    const personal = candidates.find((email) => !this.isGenericEmail(email));
    return personal ?? candidates[0] ?? null;
  }

  private phoneEligible(line: string): boolean {
    return !/sip:/i.test(line) && !POSTCODE_LINE_PATTERN.test(line);
  }

  private findPhone(lines: string[]): string | null {
    for (const line of lines) {
      if (!this.phoneEligible(line)) continue;
      const match = line.match(NINE_DIGITS_PATTERN);
      if (match) return match[0];
    }

    // Shorter extensions only count right after a work-phone label
    const phoneLabels = this.labelPatterns.filter(({ field }) => field === 'phone');
    const isWorkLabel = (line: string): boolean => {
      const head = line.split(':')[0].trim();
      return phoneLabels.some(({ pattern }) => pattern.test(head));
    };

    for (let i = 0; i < lines.length; i++) {
      if (!this.phoneEligible(lines[i])) continue;
      const match = lines[i].match(SHORT_NUMBER_PATTERN);
      if (!match) continue;
      for (let j = Math.max(0, i - PHONE_LABEL_REACH); j <= i; j++) {
        if (isWorkLabel(lines[j])) return match[0];
      }
    }
    return null;
  }

  private findSip(text: string): string | null {
    const uris = text.match(SIP_URI_PATTERN) ?? [];
    return uris.find((uri) => SIP_VALID_PATTERN.test(uri)) ?? null;
  }

  private findAddress(text: string, lines: string[]): string | null {
    const street = text.match(this.streetAddressPattern);
    if (street) return street[0].trim();

    for (const line of lines) {
      const postal = line.match(POSTAL_ADDRESS_PATTERN);
      if (postal) return postal[0].trim();
    }
    return null;
  }

  private isNameCandidate(line: string): boolean {
    return (
      line.length > 0 &&
      !this.isHeading(line) &&
      !line.startsWith(this.config.streetMarker) &&
      !/[@:\d]/.test(line)
    );
  }

  private findNameLine(lines: string[]): number | null {
    for (let i = 0; i < lines.length; i++) {
      if (this.isNameCandidate(lines[i]) && NAME_PATTERN.test(lines[i])) return i;
    }

    // "surname, given-name" written mostly in capitals
    for (let i = 0; i < Math.min(lines.length, NAME_SCAN_LINES); i++) {
      const line = lines[i];
      if (!line.includes(',') || !this.isNameCandidate(line)) continue;
      const letters = line.match(/\p{L}/gu) ?? [];
      const upper = letters.filter((letter) => letter !== letter.toLowerCase());
      if (letters.length > 0 && upper.length / letters.length > 0.5) return i;
    }
    return null;
  }

  private nameFromLine(line: string): string {
    const match = line.match(NAME_PATTERN);
    return (match ? match[0] : line).trim();
  }

  private findDepartment(lines: string[], nameIndex: number | null): string | null {
    const start = nameIndex === null ? 0 : nameIndex + 1;
    for (let i = start; i < lines.length; i++) {
      const line = lines[i];
      if (
        line.length > 3 &&
        line === line.toUpperCase() &&
        UPPERCASE_LETTER.test(line) &&
        !/[@:\d]/.test(line) &&
        !this.isHeading(line) &&
        !line.startsWith(this.config.streetMarker) &&
        !this.matchLabel(line) &&
        !this.placeholders.has(line.toLowerCase())
      ) {
        return line;
      }
    }
    return null;
  }
}

const LABELED_FIELDS: readonly LabeledField[] = [
  'department',
  'company',
  'officeLocation',
  'phone',
  'sip',
  'address',
];

function isLabeledField(value: string): value is LabeledField {
  return LABELED_FIELDS.some((field) => field === value);
}
