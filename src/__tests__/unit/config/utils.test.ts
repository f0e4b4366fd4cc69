import { describe, it, expect } from '@jest/globals';
import {
  parseDomainRoles,
  readSessionConfigFromEnv,
  splitList,
} from '../../../core/config/utils.js';

const ROLE1 = 'arn:aws:iam::123456789012:role/role1';
const ROLE2 = 'arn:aws:iam::123456789012:role/role2';

describe('Config Utils', () => {
  describe('parseDomainRoles', () => {
    it('should parse domain=arn pairs', () => {
      expect(parseDomainRoles([`example.com=${ROLE1}`, `example.org=${ROLE2}`])).toEqual({
        'example.com': ROLE1,
        'example.org': ROLE2,
      });
    });

    it('should normalize domain names', () => {
      expect(parseDomainRoles([`Example.COM.=${ROLE1}`])).toEqual({
        'example.com': ROLE1,
      });
    });

    it('should accept the same mapping twice', () => {
      expect(parseDomainRoles([`example.com=${ROLE1}`, `example.com.=${ROLE1}`])).toEqual({
        'example.com': ROLE1,
      });
    });

    it('should accept domain names that match object keys', () => {
      expect(parseDomainRoles([`constructor=${ROLE1}`, `tostring=${ROLE2}`])).toEqual({
        constructor: ROLE1,
        tostring: ROLE2,
      });
    });

    it('should reject pairs without a separator', () => {
      expect(() => parseDomainRoles(['example.com'])).toThrow(
        'invalid domain role "example.com", expected domain=roleArn'
      );
    });

    it('should reject a domain mapped to two roles', () => {
      expect(() =>
        parseDomainRoles([`example.com=${ROLE1}`, `example.com=${ROLE2}`])
      ).toThrow(`domain "example.com" is mapped to both ${ROLE1} and ${ROLE2}`);
    });
  });

  describe('splitList', () => {
    it('should split and trim comma separated values', () => {
      expect(splitList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    });

    it('should return an empty list for undefined', () => {
      expect(splitList(undefined)).toEqual([]);
    });
  });

  describe('readSessionConfigFromEnv', () => {
    it('should read every DOMAIN_ROLES_* variable', () => {
      const config = readSessionConfigFromEnv({
        DOMAIN_ROLES_PROFILE: 'dns',
        DOMAIN_ROLES_REGION: 'us-east-1',
        DOMAIN_ROLES_ASSUME_ROLE: ROLE1,
        DOMAIN_ROLES_ASSUME_ROLE_EXTERNAL_ID: 'test-external-id',
        DOMAIN_ROLES_API_RETRIES: '4',
        DOMAIN_ROLES_DOMAIN_ROLES: `example.com=${ROLE1}, example.org=${ROLE2}`,
      });

      expect(config).toEqual({
        profile: 'dns',
        region: 'us-east-1',
        assumeRole: ROLE1,
        assumeRoleExternalId: 'test-external-id',
        apiRetries: 4,
        domainRolesMap: {
          'example.com': ROLE1,
          'example.org': ROLE2,
        },
      });
    });

    it('should return an empty config when nothing is set', () => {
      expect(readSessionConfigFromEnv({})).toEqual({});
    });

    it('should reject non-integer retries', () => {
      expect(() => readSessionConfigFromEnv({ DOMAIN_ROLES_API_RETRIES: 'many' })).toThrow(
        'DOMAIN_ROLES_API_RETRIES must be an integer, got "many"'
      );
    });
  });
});
