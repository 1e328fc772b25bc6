import { describe, it, expect, beforeEach } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { RequestController } from '../src/core/request.controller.js';
import { buildDefaultMiddleware } from '../src/core/middleware/middleware.builder.js';
import { RpcErrorCode } from '../src/core/types.js';
import { PromptRegistry } from '../src/prompts/prompt.registry.js';
import { registerRcaPrompt } from '../src/prompts/rca.prompt.js';
import { ToolRegistry } from '../src/tools/tool.registry.js';
import { toolSuccess } from '../src/tools/tool.types.js';
import { newContext, silentLogger } from './helpers/fake.upstream.js';

describe('RequestController', () => {
    let controller: RequestController;

    beforeEach(() => {
        const tools = new ToolRegistry(silentLogger);
        tools.register<{ text: string }>({
            definition: {
                name: 'echo',
                description: 'Echo the text back',
                inputSchema: {
                    type: 'object',
                    properties: { text: { type: 'string' } },
                    required: ['text'],
                    additionalProperties: false,
                },
            },
            handler: async (args) => toolSuccess({ echoed: args.text }),
        });
        const prompts = new PromptRegistry();
        registerRcaPrompt(prompts, { jiraUrl: 'https://jira.example.test/' });
        controller = new RequestController(silentLogger, tools, prompts, { name: 'restbridge', version: '1.2.3' }, buildDefaultMiddleware());
    });

    it('answers initialize with server info and tool capability', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 1,
            method: 'initialize',
            params: { protocolVersion: 'not-a-version', clientInfo: { name: 'test', version: '0' } },
        }, newContext());

        expect(response).toEqual({
            jsonrpc: '2.0',
            id: 1,
            result: {
                protocolVersion: LATEST_PROTOCOL_VERSION,
                capabilities: { tools: {}, prompts: {} },
                serverInfo: { name: 'restbridge', version: '1.2.3' },
            },
        });
    });

    it('echoes a supported protocol version', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 2,
            method: 'initialize',
            params: { protocolVersion: LATEST_PROTOCOL_VERSION },
        }, newContext());
        expect(response?.result).toMatchObject({ protocolVersion: LATEST_PROTOCOL_VERSION });
    });

    it('answers ping with an empty result', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', id: 'p', method: 'ping' }, newContext());
        expect(response).toEqual({ jsonrpc: '2.0', id: 'p', result: {} });
    });

    it('lists registered tools', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', id: 3, method: 'tools/list' }, newContext());
        expect(response?.result).toEqual({
            tools: [{
                name: 'echo',
                description: 'Echo the text back',
                inputSchema: {
                    type: 'object',
                    properties: { text: { type: 'string' } },
                    required: ['text'],
                    additionalProperties: false,
                },
            }],
        });
    });

    it('calls a tool', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 4,
            method: 'tools/call',
            params: { name: 'echo', arguments: { text: 'hi' } },
        }, newContext());

        expect(response?.result).toEqual({ content: [{ type: 'text', text: JSON.stringify({ echoed: 'hi' }, null, 2) }] });
    });

    it('returns tool failures as error envelopes, not protocol errors', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 5,
            method: 'tools/call',
            params: { name: 'echo', arguments: { text: 42 } },
        }, newContext());

        expect(response?.error).toBeUndefined();
        expect(response?.result).toMatchObject({ isError: true });
    });

    it('rejects tools/call without a name', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', id: 6, method: 'tools/call', params: {} }, newContext());
        expect(response?.error?.code).toBe(RpcErrorCode.InvalidParams);
    });

    it('reports unknown methods', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', id: 7, method: 'resources/list' }, newContext());
        expect(response).toEqual({
            jsonrpc: '2.0',
            id: 7,
            error: { code: RpcErrorCode.MethodNotFound, message: 'Method not found: resources/list' },
        });
    });

    it('does not answer notifications', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', method: 'notifications/initialized' }, newContext());
        expect(response).toBeNull();
    });

    it('lists prompts', async () => {
        const response = await controller.handleRequest({ jsonrpc: '2.0', id: 8, method: 'prompts/list' }, newContext());
        expect(response?.result).toEqual({
            prompts: [{
                name: 'rca',
                description: 'Root cause analysis instructions for a failed DCI job',
                arguments: [{ name: 'dci_job_id', description: 'The DCI job to analyse', required: true }],
            }],
        });
    });

    it('renders a prompt with its arguments', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 9,
            method: 'prompts/get',
            params: { name: 'rca', arguments: { dci_job_id: 'job-77' } },
        }, newContext());

        const result = response?.result;
        expect(result).toMatchObject({
            description: 'Root cause analysis instructions for a failed DCI job',
            messages: [{ role: 'user', content: { type: 'text' } }],
        });
        const text = JSON.stringify(result);
        expect(text).toContain('Conduct a root cause analysis (RCA) of DCI job job-77.');
        expect(text).toContain('/tmp/dci/rca-job-77.md');
        expect(text).toContain('https://jira.example.test/browse/CILAB-<num>');
    });

    it('rejects prompts/get with a missing argument', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 10,
            method: 'prompts/get',
            params: { name: 'rca' },
        }, newContext());
        expect(response).toEqual({
            jsonrpc: '2.0',
            id: 10,
            error: { code: RpcErrorCode.InvalidParams, message: 'Missing arguments for rca: dci_job_id' },
        });
    });

    it('rejects unknown prompts', async () => {
        const response = await controller.handleRequest({
            jsonrpc: '2.0',
            id: 11,
            method: 'prompts/get',
            params: { name: 'triage' },
        }, newContext());
        expect(response?.error).toEqual({ code: RpcErrorCode.InvalidParams, message: 'Unknown prompt: triage' });
    });
});
