/**
 * Utility Profile Tests
 *
 * Owner normalization, wire classification, description labels and profile
 * loading.
 */

import { describe, it, expect } from 'vitest';
import { UtilityProfile } from '../../../core/profile.js';
import { ProfileError } from '../../../core/errors.js';
import { testProfile } from '../../utils/builders.js';

describe('UtilityProfile', () => {
  const profile = testProfile();

  describe('normalizeOwner', () => {
    it('should map aliases to the canonical owner', () => {
      expect(profile.normalizeOwner('prov')).toBe('PROVIDER');
      expect(profile.normalizeOwner(' Provider  Co ')).toBe('PROVIDER');
    });

    it('should uppercase unknown owners and spell out ampersands', () => {
      expect(profile.normalizeOwner('Acme & Sons')).toBe('ACME AND SONS');
    });

    it('should be idempotent', () => {
      const once = profile.normalizeOwner('prov');
      expect(profile.normalizeOwner(once)).toBe(once);
    });

    it('should return undefined for blank owners', () => {
      expect(profile.normalizeOwner('  ')).toBeUndefined();
    });
  });

  describe('classification', () => {
    it('should recognize the utility by matcher', () => {
      expect(profile.isUtilityOwner('Utility Co')).toBe(true);
      expect(profile.isUtilityOwner('PROVIDER')).toBe(false);
      expect(profile.utilityName).toBe('UTILITY');
    });

    it('should classify communications wires', () => {
      expect(profile.isCommunication('PROVIDER', 'Unknown')).toBe(true);
      expect(profile.isCommunication('OTHER', 'catv')).toBe(true);
      expect(profile.isCommunication('UTILITY', 'Fiber')).toBe(false);
    });

    it('should classify utility electrical wires', () => {
      expect(profile.isUtilityElectrical('UTILITY', 'Secondary')).toBe(true);
      expect(profile.isUtilityElectrical('UTILITY', '')).toBe(true);
      expect(profile.isUtilityElectrical('UTILITY', 'Fiber')).toBe(false);
      expect(profile.isUtilityElectrical('PROVIDER', 'Primary')).toBe(false);
    });

    it('should detect neutral descriptions', () => {
      expect(profile.isNeutral('UTILITY Neutral')).toBe(true);
      expect(profile.isNeutral('Secondary Neutral')).toBe(true);
      expect(profile.isNeutral('PROVIDER Fiber')).toBe(false);
      expect(profile.isNeutral(undefined)).toBe(false);
    });
  });

  describe('formatDescription', () => {
    const labelled = testProfile({
      descriptionRules: [{ owners: ['provider'], contains: ['fiber'], label: 'Provider Fiber Optic' }],
    });

    it('should apply a matching description rule', () => {
      expect(labelled.formatDescription('PROVIDER', 'Fiber  Cable')).toBe('Provider Fiber Optic');
    });

    it('should join owner and cable type otherwise', () => {
      expect(labelled.formatDescription('PROVIDER', 'Drop')).toBe('PROVIDER Drop');
      expect(labelled.formatDescription('', '')).toBe('Unknown Attachment');
    });
  });

  describe('sharesProviderFamily', () => {
    it('should match family members sharing a keyword', () => {
      expect(
        profile.sharesProviderFamily(
          { owner: 'PROVIDER', text: 'Fiber 144ct' },
          { owner: 'PROVIDER', text: 'fiber optic' }
        )
      ).toBe(true);
    });

    it('should not match without a shared keyword', () => {
      expect(
        profile.sharesProviderFamily({ owner: 'PROVIDER', text: 'Fiber' }, { owner: 'PROVIDER', text: 'Drop' })
      ).toBe(false);
    });
  });

  describe('loading', () => {
    it('should reject an invalid definition', () => {
      expect(() => UtilityProfile.parse({ name: '' }, 'inline-test')).toThrow(ProfileError);
    });

    it('should load the bundled default profile', async () => {
      const loaded = await UtilityProfile.load('default');

      expect(loaded.name).toBe('default');
      expect(loaded.utilityName).toBe('CPS ENERGY');
      expect(loaded.normalizeOwner('att')).toBe('AT&T');
    });

    it('should report a missing profile file', async () => {
      await expect(UtilityProfile.fromFile('/nonexistent/profile.json')).rejects.toThrow(ProfileError);
    });
  });
});
