import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadConfig, readCredentials } from './config.js'
import { UnauthenticatedError, ValidationError } from './errors.js'

describe('config', () => {
  let dir: string
  let credentialsPath: string

  async function writeCredentials(content: unknown) {
    await fs.writeFile(credentialsPath, typeof content === 'string' ? content : JSON.stringify(content))
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hookrelay-config-'))
    credentialsPath = path.join(dir, 'credentials.json')
    vi.stubEnv('HOOKRELAY_API_KEY', '')
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.rm(dir, { recursive: true, force: true })
  })

  describe('readCredentials', () => {
    it('should return null when the file is missing', async () => {
      expect(await readCredentials(credentialsPath)).toBeNull()
    })

    it('should reject a file that is not JSON', async () => {
      await writeCredentials('api_key=test-secret')

      await expect(readCredentials(credentialsPath)).rejects.toThrow(`Credential file ${credentialsPath} is not valid JSON`)
    })

    it('should reject a file without an api key', async () => {
      await writeCredentials({ project_id: 'prj_1' })

      await expect(readCredentials(credentialsPath)).rejects.toBeInstanceOf(UnauthenticatedError)
    })
  })

  describe('loadConfig', () => {
    it('should read the credential file and fill in defaults', async () => {
      await writeCredentials({
        api_key: 'test-secret',
        project_id: 'prj_1',
        project_name: 'acme',
        user_name: 'dev',
        api_base: 'http://127.0.0.1:4000',
      })

      const config = await loadConfig({ credentialsPath })

      expect(config).toMatchObject({
        apiKey: 'test-secret',
        projectId: 'prj_1',
        projectName: 'acme',
        userName: 'dev',
        apiBase: 'http://127.0.0.1:4000',
        noWss: false,
        timeoutMs: 30_000,
        maxBodyBytes: 1024 * 1024,
        concurrency: 16,
        queueSize: 256,
        drainMs: 10_000,
        insecure: false,
      })
    })

    it('should let flags win over the environment', async () => {
      await writeCredentials({ api_key: 'test-secret' })
      vi.stubEnv('HOOKRELAY_TIMEOUT_MS', '2000')

      expect((await loadConfig({ credentialsPath })).timeoutMs).toBe(2000)
      expect((await loadConfig({ credentialsPath, timeoutMs: 500 })).timeoutMs).toBe(500)
    })

    it('should prefer the api key from the environment', async () => {
      await writeCredentials({ api_key: 'file-secret' })
      vi.stubEnv('HOOKRELAY_API_KEY', 'env-secret')

      expect((await loadConfig({ credentialsPath })).apiKey).toBe('env-secret')
    })

    it('should use --ws-base as the websocket base', async () => {
      await writeCredentials({ api_key: 'test-secret' })

      const config = await loadConfig({ credentialsPath, wsBaseOverride: 'ws://127.0.0.1:9000' })

      expect(config.wsBase).toBe('ws://127.0.0.1:9000')
      expect(config.wsBaseOverride).toBe('ws://127.0.0.1:9000')
    })

    it('should fail unauthenticated without any api key', async () => {
      const err = await loadConfig({ credentialsPath }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(UnauthenticatedError)
      expect(err).toMatchObject({ exitCode: 3 })
    })

    it('should reject malformed numeric environment values', async () => {
      await writeCredentials({ api_key: 'test-secret' })
      vi.stubEnv('HOOKRELAY_CONCURRENCY', 'lots')

      const err = await loadConfig({ credentialsPath }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ValidationError)
      expect(err).toMatchObject({ message: 'HOOKRELAY_CONCURRENCY must be a positive integer, got "lots"' })
    })
  })
})
