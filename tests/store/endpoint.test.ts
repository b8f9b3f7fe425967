import { describe, it, expect } from 'vitest';
import { Endpoint, InvalidEndpointError } from '../../src/index.js';

describe('Endpoint', () => {
  describe('parse', () => {
    it('parses IPv4 with port', () => {
      expect(Endpoint.parse('10.0.0.2:9042')).toEqual({ host: '10.0.0.2', port: 9042 });
    });

    it('parses a bare IPv4 address', () => {
      expect(Endpoint.parse('10.0.0.2')).toEqual({ host: '10.0.0.2', port: undefined });
    });

    it('parses bracketed IPv6 with and without port', () => {
      expect(Endpoint.parse('[::1]:9042')).toEqual({ host: '::1', port: 9042 });
      expect(Endpoint.parse('[fe80::1]')).toEqual({ host: 'fe80::1', port: undefined });
    });

    it('parses a bare IPv6 address', () => {
      expect(Endpoint.parse('fe80::1')).toEqual({ host: 'fe80::1', port: undefined });
    });

    it('parses hostnames', () => {
      expect(Endpoint.parse('cassandra-node1:9042')).toEqual({ host: 'cassandra-node1', port: 9042 });
      expect(Endpoint.parse('db.example.com')).toEqual({ host: 'db.example.com', port: undefined });
    });

    it('trims surrounding whitespace', () => {
      expect(Endpoint.parse(' 10.0.0.2:9042 ')).toEqual({ host: '10.0.0.2', port: 9042 });
    });

    it('rejects invalid IPv4-looking hosts', () => {
      expect(() => Endpoint.parse('256.0.0.1:9042')).toThrow(InvalidEndpointError);
      expect(() => Endpoint.parse('1.2.3')).toThrow('host looks like IPv4 but is not a valid IPv4 address');
    });

    it('rejects bad ports', () => {
      expect(() => Endpoint.parse('10.0.0.2:0')).toThrow('port must be between 1 and 65535');
      expect(() => Endpoint.parse('10.0.0.2:65536')).toThrow('port must be between 1 and 65535');
      expect(() => Endpoint.parse('10.0.0.2:abc')).toThrow('port is not a valid number');
    });

    it('rejects empty hosts and unclosed brackets', () => {
      expect(() => Endpoint.parse(':9042')).toThrow('host cannot be empty');
      expect(() => Endpoint.parse('[::1:9042')).toThrow("missing closing ']'");
      expect(() => Endpoint.parse('[::1]9042')).toThrow("expected ':' after ']'");
    });

    it('includes the input in the message', () => {
      expect(() => Endpoint.parse('bad_host!')).toThrow(
        "Invalid endpoint 'bad_host!': host must be a valid IPv4 address, IPv6 address, or hostname",
      );
    });
  });

  describe('hostOf', () => {
    it('strips the port', () => {
      expect(Endpoint.hostOf('10.0.0.2:9042')).toBe('10.0.0.2');
      expect(Endpoint.hostOf('[::1]:9042')).toBe('::1');
    });

    it('returns unparseable input unchanged', () => {
      expect(Endpoint.hostOf('bad_host!')).toBe('bad_host!');
    });
  });

  describe('hostOfHostPort', () => {
    it('cuts the port at the last colon', () => {
      expect(Endpoint.hostOfHostPort('10.0.0.2:9042')).toBe('10.0.0.2');
      expect(Endpoint.hostOfHostPort('fd00::5:9042')).toBe('fd00::5');
      expect(Endpoint.hostOfHostPort('[fd00::5]:9042')).toBe('fd00::5');
    });

    it('returns input without a trailing port unchanged', () => {
      expect(Endpoint.hostOfHostPort('10.0.0.2')).toBe('10.0.0.2');
      expect(Endpoint.hostOfHostPort('fd00::abc')).toBe('fd00::abc');
    });
  });

  describe('sameHost', () => {
    it('ignores ports', () => {
      expect(Endpoint.sameHost('10.0.0.2:9042', '10.0.0.2')).toBe(true);
      expect(Endpoint.sameHost('10.0.0.2:9042', '10.0.0.3:9042')).toBe(false);
    });
  });
});
