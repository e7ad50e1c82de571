import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { BackendClient } from '../src/backend.js'
import type { GatewayConfig } from '../src/config.js'
import { createServer } from '../src/server.js'
import { fakeBackend, hangingBackend, json, testConfig, type Profile } from './helpers.js'

const profile: Profile = {
  emailAddress: 'me@example.com',
  messagesTotal: 1204,
  threadsTotal: 877,
  historyId: '99812'
}

type Connection = { client: Client, server: Server }

let connections: Connection[] = []

const connect = async (
  fetch: ReturnType<typeof fakeBackend>['fetch'],
  options: { config?: GatewayConfig, credential?: string, signal?: AbortSignal } = {}
) => {
  const config = options.config ?? testConfig()
  const backend = new BackendClient({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs, fetch })
  const server = createServer({ config, backend, credential: options.credential, signal: options.signal })
  const client = new Client({ name: 'test-client', version: '1.0.0' })

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  await server.connect(serverTransport)
  await client.connect(clientTransport)

  connections.push({ client, server })
  return client
}

const call = async (client: Client, name: string, args: Record<string, unknown> = {}) => {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
  const [first] = result.content
  if (first?.type !== 'text') throw new Error('expected a text result')
  return { isError: result.isError ?? false, text: first.text }
}

afterEach(async () => {
  await Promise.all(connections.flatMap(({ client, server }) => [client.close(), server.close()]))
  connections = []
})

describe('MCP server', () => {
  test('lists the permitted tools with their input schemas', async () => {
    const client = await connect(fakeBackend().fetch)

    const { tools } = await client.listTools()

    expect(tools).toHaveLength(18)
    const getMessage = tools.find(tool => tool.name === 'gmail_get_message')
    expect(getMessage?.inputSchema.required).toEqual(['message_id'])
    expect(Object.keys(getMessage?.inputSchema.properties ?? {})).toEqual(['message_id', 'include_html'])
    expect(getMessage?.annotations).toEqual({ readOnlyHint: true, destructiveHint: false, openWorldHint: true })
  })

  test('hides write tools from a read-only server', async () => {
    const client = await connect(fakeBackend().fetch, { config: testConfig({ scopes: ['gmail.readonly'] }) })

    const { tools } = await client.listTools()

    expect(tools.map(tool => tool.name)).not.toContain('gmail_delete_draft')
  })

  test('returns the backend body unmodified as JSON text', async () => {
    const backend = fakeBackend(() => json(profile))
    const client = await connect(backend.fetch)

    const result = await call(client, 'gmail_get_profile')

    expect(result).toEqual({ isError: false, text: JSON.stringify(profile) })
    expect(backend.calls).toHaveLength(1)
  })

  test('reports invalid parameters as a tool error', async () => {
    const backend = fakeBackend()
    const client = await connect(backend.fetch)

    const result = await call(client, 'gmail_get_message')

    expect(result.isError).toBe(true)
    expect(JSON.parse(result.text)).toEqual({
      error: { kind: 'InvalidParameter', message: 'Invalid arguments for tool gmail_get_message: message_id: is required' }
    })
    expect(backend.calls).toHaveLength(0)
  })

  test('reports a rejected credential without the credential', async () => {
    const client = await connect(fakeBackend(() => json({ error: 'Bearer test-secret is not valid' }, 401)).fetch)

    const result = await call(client, 'gmail_list_labels')

    expect(result.isError).toBe(true)
    expect(result.text).not.toContain('test-secret')
    expect(JSON.parse(result.text)).toEqual({
      error: { kind: 'Unauthorized', message: 'Bearer [REDACTED] is not valid', status: 401 }
    })
  })

  test('forwards the connection credential', async () => {
    const backend = fakeBackend(() => json(profile))
    const client = await connect(backend.fetch, { credential: 'caller-token' })

    await call(client, 'gmail_get_profile')

    expect(backend.calls[0].headers.get('authorization')).toBe('Bearer caller-token')
  })

  test('cancels the backend call when the connection signal aborts', async () => {
    const backend = hangingBackend()
    const controller = new AbortController()
    const client = await connect(backend.fetch, { signal: controller.signal })

    const pending = call(client, 'gmail_get_profile')
    while (!backend.calls.length) await new Promise(resolve => setImmediate(resolve))
    controller.abort()

    const result = await pending
    expect(JSON.parse(result.text)).toEqual({
      error: { kind: 'BackendUnavailable', message: 'Request to the backend was cancelled' }
    })
    expect(backend.calls[0].signal?.aborted).toBe(true)
  })

  test('answers smoke tools locally', async () => {
    const backend = fakeBackend()
    const client = await connect(backend.fetch)

    await expect(call(client, 'smoke_echo', { message: 'ping' })).resolves.toEqual({ isError: false, text: 'Echo: ping' })
    expect(backend.calls).toHaveLength(0)
  })
})
