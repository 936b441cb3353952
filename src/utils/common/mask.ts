/**
 * @notice Masks an endpoint URL for logs and user-facing messages
 * @dev Query string and fragment are dropped since providers commonly carry API keys there.
 * Hosts longer than 10 characters keep only their first and last 4 characters.
 * @param url The URL to mask
 * @returns The masked URL, or `***` when the input cannot be parsed
 */
export function maskUrl(url: string) {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '***';
  }

  let host = parsed.host;
  if (host.length > 10) {
    host = `${host.slice(0, 4)}...${host.slice(-4)}`;
  }
  const path = parsed.pathname === '/' ? '' : parsed.pathname;

  return `${parsed.protocol}//${host}${path}`;
}

/**
 * @notice Masks an account or contract address, keeping the prefix and the last 4 characters
 * @param address The address to mask
 */
export function maskAddress(address: string) {
  if (address.length < 10) return '***';
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

/**
 * @notice Masks an API key or other secret for display
 * @param secret The secret to mask
 */
export function maskSecret(secret: string) {
  if (secret.length <= 8) return '***';
  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}
