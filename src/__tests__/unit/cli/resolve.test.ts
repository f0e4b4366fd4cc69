/**
 * Resolve command option tests
 */

import { describe, it, expect } from '@jest/globals';
import { createResolveCommand, toOverrides } from '../../../cli/commands/resolve.js';

const ROLE1 = 'arn:aws:iam::123456789012:role/role1';

describe('resolve command', () => {
  it('should register the resolve command', () => {
    const command = createResolveCommand();

    expect(command.name()).toBe('resolve');
    expect(command.options.map((option) => option.long)).toContain('--domain-role');
  });

  describe('toOverrides', () => {
    it('should translate flags into session overrides', () => {
      expect(
        toOverrides({
          profile: 'dns',
          region: 'us-east-1',
          assumeRole: ROLE1,
          externalId: 'test-external-id',
          apiRetries: '2',
          domainRole: [`example.com=${ROLE1}`],
        })
      ).toEqual({
        profile: 'dns',
        region: 'us-east-1',
        assumeRole: ROLE1,
        assumeRoleExternalId: 'test-external-id',
        apiRetries: 2,
        domainRolesMap: { 'example.com': ROLE1 },
      });
    });

    it('should leave unset flags undefined', () => {
      expect(toOverrides({ domainRole: [] })).toEqual({});
    });

    it('should reject non-integer retries', () => {
      expect(() => toOverrides({ apiRetries: 'x', domainRole: [] })).toThrow(
        '--api-retries must be an integer, got "x"'
      );
    });
  });
});
