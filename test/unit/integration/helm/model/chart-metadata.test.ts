// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {after, before, describe, it} from 'mocha';
import fs from 'node:fs';

import {ChartMetadata} from '../../../../../src/integration/helm/model/chart/chart-metadata.js';
import {PipelineError} from '../../../../../src/core/errors/pipeline-error.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';
import {createTemporaryDirectory, removeDirectory, writeChart} from '../../../../test-utility.js';

describe('ChartMetadata', () => {
  let root: string;

  before(() => {
    root = createTemporaryDirectory('metadata');
  });

  after(() => {
    removeDirectory(root);
  });

  it('should read name, version and app version', () => {
    const metadata = ChartMetadata.load(writeChart(root, 'web', 'web', '1.4.0-SNAPSHOT'));
    expect(metadata.name).to.equal('web');
    expect(metadata.version).to.equal('1.4.0-SNAPSHOT');
    expect(metadata.appVersion).to.equal('1.0.0');
  });

  it('should read numeric versions as text', () => {
    const directory = PathEx.join(root, 'numeric');
    fs.mkdirSync(directory);
    fs.writeFileSync(PathEx.join(directory, 'Chart.yaml'), 'name: numeric\nversion: 2.5\n');

    const metadata = ChartMetadata.load(directory);
    expect(metadata.version).to.equal('2.5');
    expect(metadata.appVersion).to.be.undefined;
  });

  it('should keep numeric versions exactly as written', () => {
    const directory = PathEx.join(root, 'trailing-zero');
    fs.mkdirSync(directory);
    fs.writeFileSync(PathEx.join(directory, 'Chart.yaml'), 'name: trailing-zero\nversion: 1.10\nappVersion: 2.0\n');

    const metadata = ChartMetadata.load(directory);
    expect(metadata.version).to.equal('1.10');
    expect(metadata.appVersion).to.equal('2.0');
  });

  it('should fail with an empty version', () => {
    const directory = PathEx.join(root, 'empty-version');
    fs.mkdirSync(directory);
    fs.writeFileSync(PathEx.join(directory, 'Chart.yaml'), "name: empty-version\nversion: ''\n");

    expect(() => ChartMetadata.load(directory)).to.throw(PipelineError, 'has no version');
  });

  it('should fail without a version', () => {
    const directory = PathEx.join(root, 'unversioned');
    fs.mkdirSync(directory);
    fs.writeFileSync(PathEx.join(directory, 'Chart.yaml'), 'name: unversioned\n');

    expect(() => ChartMetadata.load(directory)).to.throw(PipelineError, 'has no version');
  });

  it('should fail without a descriptor', () => {
    expect(() => ChartMetadata.load(PathEx.join(root, 'missing'))).to.throw(PipelineError, 'Unable to read chart descriptor');
  });
});
