import { describe, it, expect } from 'vitest';
import { validate } from '../../src/api/schemas.js';
import { serviceOrderBodies, assetBodies, documentBodies } from '../fixtures/payloads.js';

describe('Schema Layer', () => {
  describe('entities', () => {
    it('should accept a minimal service order', () => {
      const result = validate('service_order', serviceOrderBodies.minimal);

      expect(result).toEqual({ ok: true, value: { id: 1001, number: 'SO-1001', status: 'Open' } });
    });

    it('should drop unknown fields', () => {
      const result = validate('service_order', serviceOrderBodies.full);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).not.toHaveProperty('internal_notes');
        expect(result.value.client_company_name).toBe('Acme Calibration Labs');
      }
    });

    it('should normalize null optional fields to absent', () => {
      const result = validate('service_order', serviceOrderBodies.withNulls);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.client_company_id).toBeUndefined();
        expect(JSON.stringify(result.value)).toBe('{"id":1003,"number":"SO-1003","status":"Closed"}');
      }
    });

    it('should name the missing required field', () => {
      const result = validate('service_order', serviceOrderBodies.missingNumber);

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'service_order', path: 'number', message: 'Required' },
      });
    });

    it('should reject numeric strings instead of coercing them', () => {
      const result = validate('service_order', serviceOrderBodies.stringId);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.path).toBe('id');
      }
    });

    it('should reject zero and negative identifiers', () => {
      for (const id of [0, -1]) {
        const result = validate('asset', { ...assetBodies.caliper, id });
        expect(result.ok).toBe(false);
      }
    });

    it('should reject identifiers beyond the safe integer range', () => {
      const result = validate('asset', { ...assetBodies.caliper, id: Number.MAX_SAFE_INTEGER + 1 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.path).toBe('id');
      }
    });

    it('should reject a body that is not an object', () => {
      const result = validate('asset', 'nope');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.path).toBe('(root)');
      }
    });

    it('should freeze validated entities', () => {
      const result = validate('asset', assetBodies.caliper);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(Object.isFrozen(result.value)).toBe(true);
      }
    });
  });

  describe('pages', () => {
    it('should validate every item and report the nested path', () => {
      const result = validate('asset_page', {
        items: [assetBodies.caliper, { id: 9, serial_number: 'no name' }],
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.path).toBe('items.1.name');
      }
    });

    it('should default a missing item list to empty', () => {
      expect(validate('service_order_page', {})).toEqual({ ok: true, value: { items: [] } });
    });

    it('should keep total_count and next_cursor hints', () => {
      const result = validate('service_order_page', {
        items: [serviceOrderBodies.minimal],
        total_count: 40,
        next_cursor: 'abc',
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.total_count).toBe(40);
        expect(result.value.next_cursor).toBe('abc');
        expect(Object.isFrozen(result.value.items)).toBe(true);
      }
    });
  });

  describe('document lists', () => {
    it('should accept the documents envelope', () => {
      const result = validate('document_list', { documents: [documentBodies.certificate] });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(1);
        expect(result.value[0]?.filename).toBe('certificate.pdf');
      }
    });

    it('should accept a bare array', () => {
      const result = validate('document_list', [documentBodies.photo]);

      expect(result).toEqual({
        ok: true,
        value: [{ id: 9002, filename: 'gauge.jpg', content_type: 'image/jpeg', size_bytes: 512000 }],
      });
    });

    it('should treat an empty collection as valid', () => {
      expect(validate('document_list', { documents: [] })).toEqual({ ok: true, value: [] });
    });

    it('should reject negative sizes', () => {
      const result = validate('document_list', [{ ...documentBodies.photo, size_bytes: -1 }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.path).toBe('documents.0.size_bytes');
      }
    });
  });
});
