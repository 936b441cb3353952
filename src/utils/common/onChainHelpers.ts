import { type RpcClient } from '@/data/rpcClient';
import { type TokenInfo } from '@/types/types';
import { erc20Abi, type Address } from 'viem';

/**
 * @notice Gets the native token balance of an address
 * @param address The address to check the balance of
 * @param rpcClient The RPC client to use
 * @returns The balance in wei
 */
export async function getNativeBalance({
  address,
  rpcClient,
}: {
  address: Address;
  rpcClient: RpcClient;
}) {
  return rpcClient.getBalance({ address });
}

/**
 * @notice Gets the ERC20 token balance for a given address along with the token decimals
 * @param address The address to check the balance of
 * @param tokenAddress The ERC20 token contract address
 * @param rpcClient The RPC client to use for the contract calls
 */
export async function getTokenBalance({
  address,
  tokenAddress,
  rpcClient,
}: {
  address: Address;
  tokenAddress: Address;
  rpcClient: RpcClient;
}) {
  const balance = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'balanceOf',
    args: [address],
  });
  const decimals = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'decimals',
  });

  return { balance, decimals };
}

/**
 * @notice Reads the ERC20 metadata of a token contract
 * @param tokenAddress The ERC20 token contract address
 * @param rpcClient The RPC client to use for the contract calls
 */
export async function getTokenInfo({
  tokenAddress,
  rpcClient,
}: {
  tokenAddress: Address;
  rpcClient: RpcClient;
}): Promise<TokenInfo> {
  const name = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'name',
  });
  const symbol = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'symbol',
  });
  const decimals = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'decimals',
  });
  const totalSupply = await rpcClient.readContract({
    address: tokenAddress,
    abi: erc20Abi,
    functionName: 'totalSupply',
  });

  return { name, symbol, decimals, totalSupply };
}
