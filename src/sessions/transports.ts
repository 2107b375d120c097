import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { BackendIdentity } from '../types/sessionTypes.js';
import { logger } from '../utils/logger.js';

/**
 * Builds the client transport for a backend from its configured address:
 * a child process spoken to over stdio, or a Streamable HTTP endpoint.
 */
export function createTransport(backend: BackendIdentity): Transport {
    const { config } = backend;
    if (config.transport === 'http') {
        logger.debug(`Backend "${backend.id}" reachable over HTTP at ${config.url}`);
        return new StreamableHTTPClientTransport(new URL(config.url), {
            requestInit: { headers: config.headers },
        });
    }

    logger.debug(`Backend "${backend.id}" spawned as: ${config.command} ${config.args.join(' ')}`);
    const transport = new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: { ...getDefaultEnvironment(), ...config.env },
        cwd: config.workingDir,
        stderr: 'pipe',
    });
    transport.stderr?.on('data', (chunk: Buffer) => {
        logger.captureOutput(backend.id, chunk.toString(), true);
    });
    return transport;
}
