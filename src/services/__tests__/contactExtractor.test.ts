import { describe, it, expect } from 'vitest';
import type { ContactInfo } from '../../types/index.js';
import { ContactExtractor } from '../contactExtractor.js';
import { silentLogger, testConfig } from './helpers.js';

const extractor = new ContactExtractor(testConfig().extraction, silentLogger());

const EMPTY: ContactInfo = {
  name: null,
  personalEmail: null,
  phone: null,
  sip: null,
  address: null,
  department: null,
  company: null,
  officeLocation: null,
};

const FULL_CARD = [
  'GARCIA LOPEZ, MARIA',
  'DIRECCION GENERAL DE SISTEMAS',
  'CONTACTO',
  'Correo',
  'maria.garcia@example.org',
  'Trabajo:',
  '912345678',
  'MI',
  'sip:maria.garcia@example.org',
  'Dirección profesional',
  'C/ MAYOR 5',
  '28013 MADRID',
  'ORGANIZACIÓN',
  'Compañía: Ayuntamiento de Ejemplo',
  'Oficina',
  'Planta 3',
].join('\n');

describe('ContactExtractor', () => {
  describe('extract', () => {
    it('reads every field of a complete card', () => {
      expect(extractor.extract(FULL_CARD)).toEqual({
        name: 'GARCIA LOPEZ, MARIA',
        personalEmail: 'maria.garcia@example.org',
        phone: '912345678',
        sip: 'sip:maria.garcia@example.org',
        address: 'C/ MAYOR 5 28013 MADRID',
        department: 'DIRECCION GENERAL DE SISTEMAS',
        company: 'Ayuntamiento de Ejemplo',
        officeLocation: 'Planta 3',
      });
    });

    it('returns a frozen record', () => {
      expect(Object.isFrozen(extractor.extract(FULL_CARD))).toBe(true);
    });

    it('does not treat a sip address as a mailbox', () => {
      expect(extractor.extract('sip:jdoe@example.org')).toEqual({ ...EMPTY, sip: 'sip:jdoe@example.org' });
    });

    it('keeps a generic mailbox only when nothing better exists', () => {
      const info = extractor.extract('ASP164@MADRID.ORG');
      expect(info).toEqual({ ...EMPTY, personalEmail: 'ASP164@MADRID.ORG' });
    });

    it('prefers a personal address over a generic one', () => {
      const info = extractor.extract('ADM12@example.org\nluis.perez@example.org');
      expect(info.personalEmail).toBe('luis.perez@example.org');
    });

    it('reads a phone from the line below its label', () => {
      expect(extractor.extract('Trabajo:\n912345678').phone).toBe('912345678');
    });

    it('prefers a labeled phone over free-text digits', () => {
      const info = extractor.extract('Trabajo: 600 111 222\nFax 912345678');
      expect(info.phone).toBe('600 111 222');
    });

    it('finds a nine-digit number in free text', () => {
      expect(extractor.extract('Tel 600123456').phone).toBe('600123456');
    });

    it('ignores digits on a postcode line', () => {
      expect(extractor.extract('28013 MADRID 912345678').phone).toBeNull();
    });

    it('accepts a short extension only near a work-phone label', () => {
      expect(extractor.extract('Trabajo\nDirectorio\nExt 456789').phone).toBe('456789');
      expect(extractor.extract('Planta 1234567').phone).toBeNull();
    });

    it('skips placeholder values after a label', () => {
      expect(extractor.extract('Departamento: Directorio').department).toBeNull();
    });

    it('takes a value from the line below its label unless that line is a label', () => {
      const info = extractor.extract('Departamento\nOficina\nPlanta 2');
      expect(info.department).toBeNull();
      expect(info.officeLocation).toBe('Planta 2');
    });

    it('ignores a messaging label that does not hold a sip uri', () => {
      expect(extractor.extract('MI: disponible').sip).toBeNull();
    });

    it('recognises a street address in free text', () => {
      const info = extractor.extract('PEREZ, LUIS\nC/ ALCALA 10 28014 MADRID');
      expect(info.address).toBe('C/ ALCALA 10 28014 MADRID');
      expect(info.name).toBe('PEREZ, LUIS');
    });

    it('falls back to a postal code line', () => {
      expect(extractor.extract('Edificio Norte\n28014 MADRID').address).toBe('28014 MADRID');
    });

    it('accepts an uppercase comma line as a name', () => {
      expect(extractor.extract('SMITH, J').name).toBe('SMITH, J');
    });

    it('looks for the department after the name line', () => {
      const info = extractor.extract('SERVICIO CENTRAL\nPEREZ, LUIS\nRECURSOS HUMANOS');
      expect(info.name).toBe('PEREZ, LUIS');
      expect(info.department).toBe('RECURSOS HUMANOS');
    });

    it('reads mailto and tel links', () => {
      const info = extractor.extract('', ['mailto:ana%40example.org?subject=hola', 'tel:+34 600 111 222']);
      expect(info.personalEmail).toBe('ana@example.org');
      expect(info.phone).toBe('+34 600 111 222');
    });

    it('keeps an inline address value and up to three lines below it', () => {
      const info = extractor.extract(
        'Business Address: Edificio Norte\nC/ MAYOR 5\nPlanta 2\n28013 MADRID\nSecond floor annex'
      );
      expect(info.address).toBe('Edificio Norte C/ MAYOR 5 Planta 2 28013 MADRID');
    });

    it('keeps a link with a stray percent sign as written', () => {
      const info = extractor.extract('', ['mailto:100%club@example.org', 'tel:600 111 222%']);
      expect(info.personalEmail).toBe('100%club@example.org');
      expect(info.phone).toBe('600 111 222');
    });

    it('ignores a generic mailto link', () => {
      expect(extractor.extract('', ['mailto:ADM12@example.org']).personalEmail).toBeNull();
    });
  });

  describe('isGenericEmail', () => {
    it.each([
      ['asp164@example.org', true],
      ['AGM2@example.org', true],
      ['aspen@example.org', false],
      ['ADM@example.org', false],
    ])('%s -> %s', (email, expected) => {
      expect(extractor.isGenericEmail(email)).toBe(expected);
    });
  });

  describe('classify', () => {
    it('reports NOT_FOUND for an empty card', () => {
      expect(extractor.classify(EMPTY)).toBe('NOT_FOUND');
    });

    it('reports NOT_FOUND for a lone generic mailbox', () => {
      expect(extractor.classify({ ...EMPTY, personalEmail: 'ASP164@example.org' })).toBe('NOT_FOUND');
    });

    it('reports NOT_FOUND for company and office alone', () => {
      expect(extractor.classify({ ...EMPTY, company: 'Ayuntamiento', officeLocation: 'Planta 1' })).toBe(
        'NOT_FOUND'
      );
    });

    const useful: Array<[string, Partial<ContactInfo>]> = [
      ['sip', { sip: 'sip:a@example.org' }],
      ['personal email', { personalEmail: 'a.b@example.org' }],
      ['phone', { phone: '912345678' }],
      ['name with a generic mailbox', { name: 'PEREZ, LUIS', personalEmail: 'ASP1@example.org' }],
      ['address', { address: '28014 MADRID' }],
      ['department', { department: 'RECURSOS HUMANOS' }],
    ];

    it.each(useful)('reports SUCCESS with %s', (_label, fields) => {
      expect(extractor.classify({ ...EMPTY, ...fields })).toBe('SUCCESS');
    });
  });

  describe('extractFromCard', () => {
    it('returns null when the card text cannot be read', async () => {
      const info = await extractor.extractFromCard({
        innerText: async () => {
          throw new Error('detached');
        },
        linkTargets: async () => [],
      });
      expect(info).toBeNull();
    });

    it('reads the card text next to a malformed mailto link', async () => {
      const info = await extractor.extractFromCard({
        innerText: async () => 'sip:jdoe@example.org',
        linkTargets: async () => ['mailto:100%zz@example.org?subject=%'],
      });
      expect(info?.sip).toBe('sip:jdoe@example.org');
      expect(info?.personalEmail).toBe('100%zz@example.org');
    });

    it('still extracts when the links cannot be read', async () => {
      const info = await extractor.extractFromCard({
        innerText: async () => 'Tel 600123456',
        linkTargets: async () => {
          throw new Error('detached');
        },
      });
      expect(info?.phone).toBe('600123456');
    });
  });
});
