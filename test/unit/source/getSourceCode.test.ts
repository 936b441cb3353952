import { getAddress } from 'viem';
import { SourceNotFoundError } from '../../../src/types/errors';
import { getSourceCode } from '../../../src/utils/source/getSourceCode';

const ADDRESS = getAddress('0x1234567890abcdef1234567890abcdef12345678');

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status });
}

function lookup(fetchFn: typeof fetch, etherscanApiKey?: string) {
  return getSourceCode({
    chainId: 1,
    address: ADDRESS,
    sourcifyUrl: 'https://sourcify.test/server/',
    etherscanUrl: 'https://etherscan.test/v2/api',
    etherscanApiKey,
    timeoutMs: 1000,
    fetchFn,
  });
}

function requestedUrl(fetchFn: jest.Mock, call: number) {
  return String(fetchFn.mock.calls[call][0]);
}

describe('getSourceCode', () => {
  it('should render Sourcify files one after another', async () => {
    const fetchFn = jest.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse([
        { path: 'contracts/Token.sol', content: 'contract Token {}' },
        { path: 'contracts/Lib.sol', content: 'library Lib {}' },
      ]),
    );

    await expect(lookup(fetchFn)).resolves.toEqual({
      provider: 'sourcify',
      content: '// File: contracts/Token.sol\ncontract Token {}\n\n// File: contracts/Lib.sol\nlibrary Lib {}',
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(requestedUrl(fetchFn, 0)).toBe(`https://sourcify.test/server/files/1/${ADDRESS}`);
  });

  it('should fall back to Etherscan when Sourcify has no match', async () => {
    const fetchFn = jest
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}, 404))
      .mockImplementationOnce(async () => jsonResponse({ error: 'not found' }, 404))
      .mockImplementationOnce(async () =>
        jsonResponse({ status: '1', message: 'OK', result: [{ SourceCode: 'contract Vault {}' }] }),
      );

    await expect(lookup(fetchFn, 'test-secret')).resolves.toEqual({
      provider: 'etherscan',
      content: 'contract Vault {}',
    });
    const url = new URL(requestedUrl(fetchFn, 1));
    expect(url.origin + url.pathname).toBe('https://etherscan.test/v2/api');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      chainid: '1',
      module: 'contract',
      action: 'getsourcecode',
      address: ADDRESS,
      apikey: 'test-secret',
    });
  });

  it('should fall back to Etherscan when Sourcify errors', async () => {
    const fetchFn = jest
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}, 404))
      .mockImplementationOnce(async () => {
        throw new Error('fetch failed');
      })
      .mockImplementationOnce(async () =>
        jsonResponse({ status: '1', result: [{ SourceCode: 'contract Vault {}' }] }),
      );

    await expect(lookup(fetchFn, 'test-secret')).resolves.toMatchObject({ provider: 'etherscan' });
  });

  it('should skip Etherscan without an API key', async () => {
    const fetchFn = jest.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({}, 404),
    );

    await expect(lookup(fetchFn)).rejects.toThrow(SourceNotFoundError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should fail when neither service has verified source', async () => {
    const fetchFn = jest
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}, 404))
      .mockImplementationOnce(async () => jsonResponse({}, 404))
      .mockImplementationOnce(async () =>
        jsonResponse({ status: '1', result: [{ SourceCode: '' }] }),
      );

    await expect(lookup(fetchFn, 'test-secret')).rejects.toThrow(
      `Contract not found on Sourcify or Etherscan for ${ADDRESS} on chain ID 1`,
    );
  });

  it('should treat an Etherscan error status as a miss', async () => {
    const fetchFn = jest
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}, 404))
      .mockImplementationOnce(async () => jsonResponse({}, 404))
      .mockImplementationOnce(async () =>
        jsonResponse({ status: '0', message: 'NOTOK', result: 'Invalid API Key' }),
      );

    await expect(lookup(fetchFn, 'test-secret')).rejects.toThrow(SourceNotFoundError);
  });
});
