import { z } from "zod"
import type { LocalTool } from "./types.js"

// Answered locally, for checking a deployment end to end without a credential
export const smokeTools: readonly LocalTool[] = [
  {
    kind: 'local',
    name: 'smoke_echo',
    description: 'Smoke test tool that echoes its input',
    params: z.object({
      message: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }).describe('Text to echo back')
    }),
    scopes: [],
    readOnly: true,
    run: ({ message }) => `Echo: ${String(message)}`
  },
  {
    kind: 'local',
    name: 'smoke_info',
    description: 'Smoke test tool that returns server information',
    params: z.object({}),
    scopes: [],
    readOnly: true,
    run: (_args, { serverName, serverVersion }) => `${serverName} v${serverVersion} - Gmail tools served through the LIAM backend`
  }
]
