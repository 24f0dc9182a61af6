// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {TimestampPattern} from '../../../../src/core/time/timestamp-pattern.js';
import {ConfigurationError} from '../../../../src/core/errors/configuration-error.js';

describe('TimestampPattern', () => {
  const date = new Date(2024, 0, 2, 3, 4, 5, 67);

  it('should format the default pattern', () => {
    expect(TimestampPattern.compile('yyyyMMddHHmmss').format(date)).to.equal('20240102030405');
  });

  it('should copy separators and quoted literals', () => {
    expect(TimestampPattern.compile("yyyy-MM-dd'T'HH.mm").format(date)).to.equal('2024-01-02T03.04');
    expect(TimestampPattern.compile("HH''mm").format(date)).to.equal("03'04");
  });

  it('should format two digit years, the 12 hour clock and fractions of a second', () => {
    const afternoon = new Date(2031, 11, 9, 15, 7, 8, 5);
    expect(TimestampPattern.compile('yy').format(afternoon)).to.equal('31');
    expect(TimestampPattern.compile('hh:mm a').format(afternoon)).to.equal('03:07 PM');
    expect(TimestampPattern.compile('h a').format(new Date(2031, 0, 1, 0, 0))).to.equal('12 AM');
    expect(TimestampPattern.compile('SSS').format(afternoon)).to.equal('005');
    expect(TimestampPattern.compile('S').format(date)).to.equal('0');
    expect(TimestampPattern.compile('SSSSS').format(date)).to.equal('06700');
  });

  it('should not pad single letters beyond the value', () => {
    expect(TimestampPattern.compile('d.M.y H:m:s').format(date)).to.equal('2.1.2024 3:4:5');
  });

  it('should format month and day names and the day of year', () => {
    expect(TimestampPattern.compile('dd MMM yyyy').format(date)).to.equal('02 Jan 2024');
    expect(TimestampPattern.compile('EEEE, MMMM d').format(date)).to.equal('Tuesday, January 2');
    expect(TimestampPattern.compile('E EEE').format(date)).to.equal('Tue Tue');
    expect(TimestampPattern.compile('D DDD').format(date)).to.equal('2 002');
    expect(TimestampPattern.compile('yyyyDDD').format(new Date(2024, 11, 31, 23, 59))).to.equal('2024366');
  });

  it('should keep the source pattern', () => {
    expect(TimestampPattern.compile('yyyyMMdd').pattern).to.equal('yyyyMMdd');
  });

  it('should reject an empty pattern', () => {
    expect(() => TimestampPattern.compile('')).to.throw(ConfigurationError, 'timestamp format must not be empty');
  });

  it('should reject unknown letters', () => {
    expect(() => TimestampPattern.compile('yyyyQQ')).to.throw(
      ConfigurationError,
      "Unknown pattern letter 'Q' in timestamp format: yyyyQQ",
    );
  });

  it('should reject too many repeated letters', () => {
    expect(() => TimestampPattern.compile('yyyyMMMMM')).to.throw(
      ConfigurationError,
      "Too many pattern letters 'M' in timestamp format: yyyyMMMMM",
    );
  });

  it('should reject an unterminated quote', () => {
    expect(() => TimestampPattern.compile("yyyy'T")).to.throw(
      ConfigurationError,
      "Unterminated quote in timestamp format: yyyy'T",
    );
  });

  it('should record the configuration key on the error', () => {
    try {
      TimestampPattern.compile('x');
      expect.fail('expected an error');
    } catch (error) {
      expect(error).to.be.instanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.meta).to.deep.equal({key: 'timestampFormat'});
      }
    }
  });
});
