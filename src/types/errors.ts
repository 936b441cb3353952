import { maskUrl } from '@/utils/common/mask';

/** @notice Number of failed endpoints named in an AllEndpointsFailedError message */
const MAX_REPORTED_FAILURES = 3;

/**
 * @notice Base class for every failure raised by pool, selector, registry and lookup operations
 * @dev Messages never contain raw endpoint URLs; endpoints are masked before they reach a message.
 */
export abstract class RailError extends Error {
  public readonly code: string;
  public readonly hint: string | undefined;
  public readonly chainId: number | undefined;

  constructor(message: string, code: string, options: { chainId?: number; hint?: string } = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.chainId = options.chainId;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class InvalidInputError extends RailError {
  constructor(message: string, hint?: string) {
    super(message, 'INVALID_INPUT', { hint });
  }
}

export class EndpointUnreachableError extends RailError {
  public readonly reason: string;

  constructor(chainId: number, endpoint: string, reason: string) {
    super(
      `RPC URL ${maskUrl(endpoint)} is unreachable or does not serve chain ID ${chainId}: ${reason}`,
      'ENDPOINT_UNREACHABLE',
      { chainId, hint: 'Check the URL and that it belongs to the requested chain' },
    );
    this.reason = reason;
  }
}

export class NoPrimaryConfiguredError extends RailError {
  constructor(chainId: number) {
    super(`No primary RPC configured for chain ID ${chainId}`, 'NO_PRIMARY_CONFIGURED', {
      chainId,
      hint: `Set a primary first with set-rpc ${chainId} <url>`,
    });
  }
}

export class DuplicateEndpointError extends RailError {
  constructor(chainId: number, endpoint: string) {
    super(
      `RPC URL ${maskUrl(endpoint)} is already configured for chain ID ${chainId}`,
      'DUPLICATE_ENDPOINT',
      { chainId },
    );
  }
}

export class NoConfigurationError extends RailError {
  constructor(chainId: number) {
    super(`No RPC configuration for chain ID ${chainId}`, 'NO_CONFIGURATION', {
      chainId,
      hint: `Use set-rpc ${chainId} <url> first`,
    });
  }
}

export class NoBackupAvailableError extends RailError {
  constructor(chainId: number) {
    super(`No backup RPCs configured for chain ID ${chainId}`, 'NO_BACKUP_AVAILABLE', {
      chainId,
      hint: `Add one with add-backup ${chainId} <url>`,
    });
  }
}

export class NotConfiguredError extends RailError {
  constructor(chainId: number) {
    super(`No RPC configuration found for chain ID ${chainId}`, 'NOT_CONFIGURED', { chainId });
  }
}

export class AllEndpointsFailedError extends RailError {
  /** @notice The first failed endpoints, in probe order */
  public readonly failedEndpoints: string[];
  /** @notice How many further failures were left out of `failedEndpoints` */
  public readonly omitted: number;

  constructor(chainId: number, failures: { endpoint: string; error: string }[]) {
    const reported = failures.slice(0, MAX_REPORTED_FAILURES);
    const omitted = failures.length - reported.length;
    const details = reported.map(({ endpoint, error }) => `${maskUrl(endpoint)} (${error})`);
    if (omitted > 0) details.push(`...and ${omitted} more`);

    super(`All RPCs failed for chain ID ${chainId}: ${details.join(', ')}`, 'ALL_ENDPOINTS_FAILED', {
      chainId,
      hint: `Add a working endpoint with add-backup ${chainId} <url> or find one with discover ${chainId}`,
    });
    this.failedEndpoints = reported.map(({ endpoint }) => endpoint);
    this.omitted = omitted;
  }
}

export class RegistryUnavailableError extends RailError {
  constructor(reason: string) {
    super(`Chain registry is unavailable: ${reason}`, 'REGISTRY_UNAVAILABLE');
  }
}

export class NoReliableEndpointsError extends RailError {
  public readonly candidatesProbed: number;

  constructor(chainId: number, candidatesProbed: number) {
    super(
      candidatesProbed === 0
        ? `No usable public RPC candidates listed for chain ID ${chainId}`
        : `No reliable RPC URLs found for chain ID ${chainId} (${candidatesProbed} candidates probed)`,
      'NO_RELIABLE_ENDPOINTS',
      { chainId },
    );
    this.candidatesProbed = candidatesProbed;
  }
}

export class ApiKeyNotFoundError extends RailError {
  constructor(provider: string) {
    super(`No API key found for ${provider}`, 'API_KEY_NOT_FOUND');
  }
}

export class SourceNotFoundError extends RailError {
  constructor(chainId: number, address: string) {
    super(
      `Contract not found on Sourcify or Etherscan for ${address} on chain ID ${chainId}`,
      'SOURCE_NOT_FOUND',
      { chainId, hint: 'Etherscan is only queried when an etherscan API key is stored' },
    );
  }
}

export class EncryptionError extends RailError {
  constructor(message: string) {
    super(message, 'ENCRYPTION_FAILED', { hint: 'Check RAIL_ENCRYPTION_PASSWORD' });
  }
}
