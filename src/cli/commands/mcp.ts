import { runMcpServer } from '../../mcp/index.js';
import { exitWithError } from '../session.js';

export async function mcpCommand(): Promise<void> {
  try {
    await runMcpServer();
  } catch (error) {
    exitWithError(error);
  }
}
