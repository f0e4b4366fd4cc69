/**
 * STS Role Assumer Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { STSClient, AssumeRoleCommand } from '@aws-sdk/client-sts';
import {
  StsRoleAssumer,
  createRoleSessionName,
  DEFAULT_SESSION_PREFIX,
} from '../../../core/aws/role-assumer.js';
import { RoleAssumptionError } from '../../../core/aws/errors.js';
import { ROLE1 } from '../../helpers/aws-env.js';

const stsMock = mockClient(STSClient);

describe('StsRoleAssumer', () => {
  beforeEach(() => {
    stsMock.reset();
  });

  it('should exchange a role ARN for temporary credentials', async () => {
    const expiration = new Date('2030-01-01T00:00:00Z');
    stsMock.on(AssumeRoleCommand).resolves({
      Credentials: {
        AccessKeyId: 'ASIATESTASSUMED',
        SecretAccessKey: 'test-secret',
        SessionToken: 'session-token',
        Expiration: expiration,
      },
    });

    const assumer = new StsRoleAssumer(new STSClient({ region: 'us-east-1' }));
    const credentials = await assumer.assumeRole({
      roleArn: ROLE1,
      roleSessionName: 'dns-sync-1',
      externalId: 'test-external-id',
      durationSeconds: 900,
    });

    expect(credentials).toEqual({
      accessKeyId: 'ASIATESTASSUMED',
      secretAccessKey: 'test-secret',
      sessionToken: 'session-token',
      expiration,
    });

    const calls = stsMock.commandCalls(AssumeRoleCommand);
    expect(calls).toHaveLength(1);
    expect(calls[0].args[0].input).toEqual({
      RoleArn: ROLE1,
      RoleSessionName: 'dns-sync-1',
      ExternalId: 'test-external-id',
      DurationSeconds: 900,
    });
  });

  it('should propagate STS errors unchanged', async () => {
    const accessDenied = new Error('User is not authorized to perform: sts:AssumeRole');
    stsMock.on(AssumeRoleCommand).rejects(accessDenied);

    const assumer = new StsRoleAssumer(new STSClient({ region: 'us-east-1' }));

    await expect(
      assumer.assumeRole({ roleArn: ROLE1, roleSessionName: 'dns-sync-1' })
    ).rejects.toBe(accessDenied);
  });

  it('should throw RoleAssumptionError when STS returns no credentials', async () => {
    stsMock.on(AssumeRoleCommand).resolves({});

    const assumer = new StsRoleAssumer(new STSClient({ region: 'us-east-1' }));

    await expect(
      assumer.assumeRole({ roleArn: ROLE1, roleSessionName: 'dns-sync-1' })
    ).rejects.toThrow(
      `STS AssumeRole succeeded but did not return credentials for role ${ROLE1}`
    );
  });

  it('should throw RoleAssumptionError when credentials are incomplete', async () => {
    stsMock.on(AssumeRoleCommand).resolves({
      Credentials: {
        AccessKeyId: 'ASIATESTASSUMED',
        SecretAccessKey: 'test-secret',
        SessionToken: undefined,
        Expiration: new Date('2030-01-01T00:00:00Z'),
      },
    });

    const assumer = new StsRoleAssumer(new STSClient({ region: 'us-east-1' }));

    await expect(
      assumer.assumeRole({ roleArn: ROLE1, roleSessionName: 'dns-sync-1' })
    ).rejects.toBeInstanceOf(RoleAssumptionError);
  });
});

describe('createRoleSessionName', () => {
  const now = new Date(1700000000000);

  it('should append the timestamp to the prefix', () => {
    expect(createRoleSessionName('dns-sync', now)).toBe('dns-sync-1700000000000');
  });

  it('should use the default prefix', () => {
    expect(createRoleSessionName(undefined, now)).toBe(
      `${DEFAULT_SESSION_PREFIX}-1700000000000`
    );
  });

  it('should replace characters STS does not accept', () => {
    expect(createRoleSessionName('dns sync/prod', now)).toBe('dns-sync-prod-1700000000000');
  });

  it('should stay within 64 characters', () => {
    const name = createRoleSessionName('x'.repeat(100), now);

    expect(name).toHaveLength(64);
    expect(name.endsWith('-1700000000000')).toBe(true);
  });
});
