/**
 * Plain-config parsing tests: strict and lenient modes, friendly errors
 */

import * as sinon from 'sinon';
import { describe, it, afterEach } from 'mocha';
import { expect } from 'chai';
import { parseProvisioningOptions, safeParseProvisioningOptions } from '../../../../../src/providers/softlayer/validation/schemas';
import type { ValidationConfig, ValidationLogger } from '../../../../../src/providers/softlayer/validation/config';
import { normalizeOptionsInput } from '../../../../../src/providers/softlayer/validation/normalization';
import { ValidationError } from '../../../../../src/core/errors/taxonomy';
import { Optional } from '../../../../../src/core/types';

function stubLogger(): { logRepair: sinon.SinonStub; logDropped: sinon.SinonStub } {
  return {
    logRepair: sinon.stub(),
    logDropped: sinon.stub(),
  };
}

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

const fullInput = {
  inboundPorts: [22, 443],
  blockOnPort: { port: 22, seconds: 60 },
  publicKey: 'ssh-ed25519 AAAAtestkey',
  userMetadata: { role: 'web' },
  nodeNames: ['web-1'],
  networks: ['frontend'],
  domainName: 'example.com',
  blockDevices: [100, 250],
  diskType: 'SAN',
  portSpeed: 100,
  userData: '#cloud-config',
  primaryNetworkVlanId: 1,
  primaryBackendNetworkVlanId: 2,
  hourlyBillingFlag: true,
  dedicatedAccountHostOnlyFlag: false,
  privateNetworkOnlyFlag: false,
  postInstallScriptUri: 'https://example.com/setup.sh',
  sshKeys: [9],
  notes: 'frontend node',
};

describe('parseProvisioningOptions', () => {

  afterEach(() => {
    sinon.restore();
  });

  describe('strict mode', () => {
    const strict = (logger?: ValidationLogger): ValidationConfig => ({ mode: 'strict', logger });

    it('should apply every field of a valid input', () => {
      const options = parseProvisioningOptions(fullInput, strict());

      expect(options.toSnapshot()).to.deep.equal({ kind: 'softlayer', ...fullInput });
    });

    it('should return defaults for an empty object', () => {
      const options = parseProvisioningOptions({}, strict());

      expect(options.getDomainName()).to.equal('jclouds.org');
      expect(options.getBlockDevices().present).to.equal(false);
      expect(options.isSealed()).to.equal(false);
    });

    it('should reject unknown keys with a hint', () => {
      const error = captureValidationError(() => parseProvisioningOptions({ diskType: 'SAN', flavour: 'large' }, strict()));

      expect(error.code).to.equal('OPTIONS_CONFIG_INVALID');
      expect(error.context.errors).to.deep.equal([{
        field: '(root)',
        message: 'Unknown option(s): flavour',
        suggestion: 'Remove them, or parse in lenient mode to ignore them',
      }]);
      expect(error.message).to.equal(
        'Invalid provisioning options:\n' +
        '  - (root): Unknown option(s): flavour\n' +
        '    hint: Remove them, or parse in lenient mode to ignore them'
      );
    });

    it('should not repair whitespace', () => {
      const logger = stubLogger();
      const error = captureValidationError(() => parseProvisioningOptions({ domainName: ' example.com ' }, strict(logger)));

      expect(error.context.errors).to.deep.equal([{
        field: 'domainName',
        message: 'Domain name has no public suffix',
        suggestion: 'Use a registrable domain such as "example.com"',
      }]);
      sinon.assert.notCalled(logger.logRepair);
    });
  });

  describe('lenient mode', () => {
    const lenient = (logger?: ValidationLogger): ValidationConfig => ({ mode: 'lenient', logger });

    it('should trim strings and lower-case the domain, reporting each repair', () => {
      const logger = stubLogger();
      const options = parseProvisioningOptions(
        { domainName: ' Example.COM ', diskType: ' SAN ', notes: ' keep spacing ' },
        lenient(logger)
      );

      expect(options.getDomainName()).to.equal('example.com');
      expect(options.getDiskType()).to.deep.equal(Optional.of('SAN'));
      expect(options.getNotes()).to.deep.equal(Optional.of(' keep spacing '));
      sinon.assert.calledTwice(logger.logRepair);
      sinon.assert.calledWithExactly(logger.logRepair, 'domainName', ' Example.COM ', 'example.com');
      sinon.assert.calledWithExactly(logger.logRepair, 'diskType', ' SAN ', 'SAN');
    });

    it('should drop unknown keys and report them', () => {
      const logger = stubLogger();
      const options = parseProvisioningOptions({ portSpeed: 10, flavour: 'large' }, lenient(logger));

      expect(options.getPortSpeed()).to.deep.equal(Optional.of(10));
      sinon.assert.calledOnceWithExactly(logger.logDropped, 'flavour', 'large');
    });

    it('should report unknown keys named like object members', () => {
      const logger = stubLogger();
      const options = parseProvisioningOptions({ constructor: 1, toString: 'x', notes: 'kept' }, lenient(logger));

      expect(options.getNotes()).to.deep.equal(Optional.of('kept'));
      sinon.assert.calledTwice(logger.logDropped);
      sinon.assert.calledWithExactly(logger.logDropped, 'constructor', 1);
      sinon.assert.calledWithExactly(logger.logDropped, 'toString', 'x');
    });

    it('should still reject values of the wrong type', () => {
      const error = captureValidationError(() => parseProvisioningOptions({ portSpeed: 'fast' }, lenient()));

      expect(error.context.errors).to.deep.equal([{
        field: 'portSpeed',
        message: 'Expected number, received string',
        suggestion: 'Provide a valid number for portSpeed',
      }]);
    });

    it('should report empty lists and bad elements per field', () => {
      const error = captureValidationError(() =>
        parseProvisioningOptions({ blockDevices: [], sshKeys: ['x'] }, lenient()));

      expect(error.context.errors).to.deep.equal([
        { field: 'blockDevices', message: 'Must contain at least one entry' },
        {
          field: 'sshKeys.0',
          message: 'Expected number, received string',
          suggestion: 'Provide numeric SSH key ids, e.g. [12345]',
        },
      ]);
    });

    it('should reject input that is not an object', () => {
      const error = captureValidationError(() => parseProvisioningOptions('domainName=example.com', lenient()));

      expect(error.context.errors).to.deep.equal([{
        field: '(root)',
        message: 'Expected object, received string',
        suggestion: 'Provide a valid object for (root)',
      }]);
    });
  });

  it('should use the environment defaults when no config is given', () => {
    const options = parseProvisioningOptions({ domainName: ' example.org', extra: 1 });

    expect(options.getDomainName()).to.equal('example.org');
  });
});

describe('safeParseProvisioningOptions', () => {
  it('should return undefined for invalid input', () => {
    expect(safeParseProvisioningOptions({ domainName: 'localhost' }, { mode: 'strict' })).to.equal(undefined);
  });

  it('should return the options for valid input', () => {
    const options = safeParseProvisioningOptions({ sshKeys: [1, 2] }, { mode: 'strict' });

    expect(options?.getSshKeys()).to.deep.equal(Optional.of([1, 2]));
  });
});

describe('normalizeOptionsInput', () => {
  it('should leave non-string values and verbatim payloads alone', () => {
    const raw = { portSpeed: 10, userData: '  #!/bin/sh  ', privateKey: ' pem ', diskType: ' SAN' };

    expect(normalizeOptionsInput(raw)).to.deep.equal({
      portSpeed: 10,
      userData: '  #!/bin/sh  ',
      privateKey: ' pem ',
      diskType: 'SAN',
    });
  });

  it('should honor disabled normalizations', () => {
    const normalized = normalizeOptionsInput(
      { domainName: ' Example.com ' },
      { trimWhitespace: false, lowercaseDomainName: true }
    );

    expect(normalized).to.deep.equal({ domainName: ' example.com ' });
  });
});
