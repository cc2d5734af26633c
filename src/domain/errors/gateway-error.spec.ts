import { GatewayError, classifyError, isGatewayError } from './gateway-error';

describe('GatewayError', () => {
  it('should build messages per kind', () => {
    expect(GatewayError.notFound('Team east-ops').message).toBe('Team east-ops not found');
    expect(GatewayError.alreadyExists('Folder Franchises').message).toBe('Folder Franchises already exists');
    expect(GatewayError.unavailable('Directory').message).toBe('Directory unavailable');
    expect(GatewayError.unavailable('Directory', 'connection refused').message).toBe('Directory unavailable: connection refused');
  });

  it('should narrow by kind', () => {
    const error = GatewayError.notFound('User jdoe');
    expect(isGatewayError(error)).toBe(true);
    expect(isGatewayError(error, 'NotFound')).toBe(true);
    expect(isGatewayError(error, 'AlreadyExists')).toBe(false);
    expect(isGatewayError(new Error('User jdoe not found'))).toBe(false);
  });

  it('should classify foreign values as GatewayUnavailable', () => {
    expect(classifyError(GatewayError.notFound('User jdoe'))).toEqual({ kind: 'NotFound', message: 'User jdoe not found' });
    expect(classifyError(new TypeError('bad'))).toEqual({ kind: 'GatewayUnavailable', message: 'bad' });
    expect(classifyError(42)).toEqual({ kind: 'GatewayUnavailable', message: '42' });
  });
});
