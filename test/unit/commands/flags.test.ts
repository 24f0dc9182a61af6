// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {Flags} from '../../../src/commands/flags.js';

describe('Flags', () => {
  it('should build yargs options without defaults', () => {
    expect(Flags.optionsOf(Flags.chartDirectory, Flags.skip)).to.deep.equal({
      'chart-directory': {
        describe: 'Directories searched for charts (default: src/main/helm)',
        alias: 'd',
        type: 'array',
      },
      skip: {describe: 'Skip every goal', alias: undefined, type: 'boolean'},
    });
  });

  it('should read configuration values by flag name', () => {
    const values = Flags.readValues(
      {_: [], 'chart-version': '1.0.0', 'skip-package': false, 'quiet-mode': true, config: 'pipeline.yaml'},
      ...Flags.PACKAGE_FLAGS,
    );
    expect(values).to.deep.equal({chartVersion: '1.0.0', skipPackage: false});
  });

  it('should mask secrets when displaying values', () => {
    expect(Flags.displayValues({_: [], key: 'release', passphrase: 'test-secret'}, Flags.key, Flags.passphrase)).to.deep.equal([
      'key: release',
      'passphrase: ********',
    ]);
  });

  it('should give every flag a unique name', () => {
    const names = Flags.PACKAGE_FLAGS.map(flag => flag.name);
    expect(new Set(names).size).to.equal(names.length);
  });
});
