import { describe, expect, it } from 'vitest';
import { UsageError } from '../utils/errors';
import { abbreviateCommand, formatIndexEntry } from './IndexEntry';

describe('abbreviateCommand', () => {
	it('brackets the part of each word beyond the abbreviation', () => {
		expect(abbreviateCommand('show interfaces status', 'sh int st')).toBe('sh[[ow]] int[[erfaces]] st[[atus]]');
	});

	it('leaves words given in full unbracketed', () => {
		expect(abbreviateCommand('show version', 'show ver')).toBe('show ver[[sion]]');
	});

	it('covers only as many words as the abbreviation has', () => {
		expect(abbreviateCommand('show ip route', 'sh')).toBe('sh[[ow]]');
	});

	it('rejects abbreviations with extra words', () => {
		expect(() => abbreviateCommand('show version', 'sh ver det')).toThrow(UsageError);
	});
});

describe('formatIndexEntry', () => {
	it('names the template, vendor and command pattern', () => {
		expect(
			formatIndexEntry('/repo/ntc_templates/templates/cisco_ios_show_version.textfsm', 'cisco_ios', 'show version', 'sh ver'),
		).toBe('cisco_ios_show_version.textfsm, .*, cisco_ios, sh[[ow]] ver[[sion]]');
	});
});
