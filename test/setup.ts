import os from 'os'
import path from 'path'

process.env.LOG_PATH = path.join(os.tmpdir(), `gmail-gateway-mcp-test-${process.pid}.log`)
process.env.LOG_LEVEL = 'info'
