#!/usr/bin/env node
import { loadConfig } from '@/constants/constants';
import type ChainToolkit from '@/modules/ChainToolkit';
import { createRail } from '@/modules/createRail';
import { describeError } from '@/utils/common/describeError';
import { logger } from '@/utils/common/log';
import { Command } from 'commander';

type ToolCall = (toolkit: ChainToolkit) => Promise<string>;

/**
 * @notice Builds the toolkit, runs one tool operation and prints its text
 * @dev A result rendered as an error sets a non-zero exit code
 */
async function runTool(call: ToolCall) {
  const { toolkit } = await createRail(loadConfig());
  const output = await call(toolkit);
  console.log(output);
  if (output.startsWith('Error:')) process.exitCode = 1;
}

const program = new Command();

program
  .name('chain-rail')
  .description('Failover RPC endpoint pools and public endpoint discovery for EVM chains')
  .version('1.0.0');

program
  .command('set-rpc')
  .description('Probe an RPC URL and make it the primary endpoint of a chain')
  .argument('<chainId>', 'chain ID')
  .argument('<url>', 'RPC URL')
  .action(async (chainId: string, url: string) => runTool(toolkit => toolkit.setRpc(chainId, url)));

program
  .command('add-backup')
  .description('Probe an RPC URL and append it as a backup endpoint')
  .argument('<chainId>', 'chain ID')
  .argument('<url>', 'RPC URL')
  .action(async (chainId: string, url: string) =>
    runTool(toolkit => toolkit.setBackupRpc(chainId, url)),
  );

program
  .command('rotate')
  .description('Move the primary endpoint to the end of the pool')
  .argument('<chainId>', 'chain ID')
  .action(async (chainId: string) => runTool(toolkit => toolkit.rotateRpc(chainId)));

program
  .command('delete-rpc')
  .description('Remove every endpoint configured for a chain')
  .argument('<chainId>', 'chain ID')
  .action(async (chainId: string) => runTool(toolkit => toolkit.deleteRpc(chainId)));

program
  .command('list')
  .description('Show configured endpoints and API keys')
  .action(async () => runTool(toolkit => toolkit.listConfigs()));

program
  .command('health')
  .description('Probe every endpoint of a chain without reordering it')
  .argument('<chainId>', 'chain ID')
  .action(async (chainId: string) => runTool(toolkit => toolkit.checkRpcHealth(chainId)));

program
  .command('discover')
  .description('Find working public RPC URLs for a chain')
  .argument('<chainId>', 'chain ID')
  .action(async (chainId: string) => runTool(toolkit => toolkit.queryRpcUrls(chainId)));

program
  .command('balance')
  .description('Native currency balance of an address')
  .argument('<chainId>', 'chain ID')
  .argument('<address>', 'account address')
  .action(async (chainId: string, address: string) =>
    runTool(toolkit => toolkit.checkNativeBalance(chainId, address)),
  );

program
  .command('token-balance')
  .description('ERC20 balance of an address')
  .argument('<chainId>', 'chain ID')
  .argument('<token>', 'token contract address')
  .argument('<owner>', 'owner address')
  .action(async (chainId: string, token: string, owner: string) =>
    runTool(toolkit => toolkit.getTokenBalance(chainId, token, owner)),
  );

program
  .command('token-info')
  .description('ERC20 name, symbol, decimals and total supply')
  .argument('<chainId>', 'chain ID')
  .argument('<token>', 'token contract address')
  .action(async (chainId: string, token: string) =>
    runTool(toolkit => toolkit.getTokenInfo(chainId, token)),
  );

program
  .command('source')
  .description('Verified source code of a contract from Sourcify or Etherscan')
  .argument('<chainId>', 'chain ID')
  .argument('<address>', 'contract address')
  .action(async (chainId: string, address: string) =>
    runTool(toolkit => toolkit.getSourceCode(chainId, address)),
  );

program
  .command('set-api-key')
  .description('Store an API key for a provider')
  .argument('<provider>', 'provider name, e.g. etherscan')
  .argument('<apiKey>', 'API key')
  .action(async (provider: string, apiKey: string) =>
    runTool(toolkit => toolkit.setApiKey(provider, apiKey)),
  );

program
  .command('delete-api-key')
  .description('Remove the API key stored for a provider')
  .argument('<provider>', 'provider name')
  .action(async (provider: string) => runTool(toolkit => toolkit.deleteApiKey(provider)));

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ err: describeError(error) }, 'chain-rail failed');
  process.exitCode = 1;
});
