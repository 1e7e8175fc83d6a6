import { expect } from 'chai'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import type { FetchLike } from '../../src/lib/api/request.js'
import type { ConfigOverrides } from '../../src/lib/config.js'

import { ApiCaller, buildUrl, DRY_RUN_PAYLOAD } from '../../src/lib/api/request.js'
import { Configurator } from '../../src/lib/config.js'
import { classifyTransportFailure, HttpError, SafeModeError, TransportError } from '../../src/lib/errors.js'

interface RecordedCall {
  init?: RequestInit
  url: string
}

const BASE = 'https://docs.getgrist.com/api'

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    headers: { 'content-type': 'application/json' },
    status,
    statusText,
  })
}

function fakeFetch(respond: () => Response): { calls: RecordedCall[]; fetch: FetchLike } {
  const calls: RecordedCall[] = []
  return {
    calls,
    async fetch(url, init) {
      calls.push({ init, url })
      return respond()
    },
  }
}

function makeConfigurator(dir: string, overrides: ConfigOverrides = {}): Configurator {
  return new Configurator(
    { GRIST_API_KEY: 'test-secret', ...overrides },
    { configPath: join(dir, 'missing.json'), env: {} }
  )
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }

  return undefined
}

describe('lib/api/request', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'grist-request-'))
  })

  afterEach(() => {
    rmSync(tempDir, { force: true, recursive: true })
  })

  describe('buildUrl', () => {
    it('skips undefined values and encodes the rest', () => {
      expect(buildUrl(`${BASE}/sql`, { q: 'select * from T', skip: undefined })).to.equal(
        `${BASE}/sql?q=select%20*%20from%20T`
      )
    })

    it('appends to an existing query string', () => {
      expect(buildUrl(`${BASE}/x?a=1`, { b: true })).to.equal(`${BASE}/x?a=1&b=true`)
    })

    it('leaves the url alone without params', () => {
      expect(buildUrl(`${BASE}/x`, { a: undefined })).to.equal(`${BASE}/x`)
    })
  })

  describe('call', () => {
    it('sends the request and parses a JSON body', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse({ tables: [] }))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      const result = await caller.call({ params: { hidden: true }, url: `${BASE}/docs/d1/tables` })

      expect(result).to.deep.equal([200, { tables: [] }])
      expect(calls).to.have.length(1)
      expect(calls[0].url).to.equal(`${BASE}/docs/d1/tables?hidden=true`)
      expect(calls[0].init?.method).to.equal('GET')
      expect(calls[0].init?.headers).to.deep.equal({
        Accept: 'application/json',
        Authorization: 'Bearer test-secret',
        Connection: 'close',
        'Content-Type': 'application/json',
      })
      expect(caller.ok).to.be.true
      expect(caller.apiCalls).to.equal(1)
      expect(caller.responseAsJson()).to.equal('{"tables":[]}')
    })

    it('serializes the body as JSON', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse(null))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      await caller.call({ body: { name: 'Sales' }, method: 'PATCH', url: `${BASE}/workspaces/3`, write: true })

      expect(calls[0].init?.method).to.equal('PATCH')
      expect(calls[0].init?.body).to.equal('{"name":"Sales"}')
    })

    it('keeps connections alive inside a session', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse(null))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      caller.openSession()
      await caller.call({ url: `${BASE}/orgs` })
      caller.closeSession()
      await caller.call({ url: `${BASE}/orgs` })

      expect(calls[0].init?.headers).to.deep.include({ Connection: 'keep-alive' })
      expect(calls[1].init?.headers).to.deep.include({ Connection: 'close' })
    })

    it('returns the error body of a bad status when raising is off', async () => {
      const { fetch } = fakeFetch(() => jsonResponse({ error: 'not found' }, 404, 'Not Found'))
      const caller = new ApiCaller(makeConfigurator(tempDir, { GRIST_RAISE_ERROR: 'N' }), { fetch })

      const result = await caller.call({ url: `${BASE}/docs/nope` })

      expect(result).to.deep.equal([404, { error: 'not found' }])
      expect(caller.ok).to.be.false
      expect(caller.apiCalls).to.equal(1)
    })

    it('throws an HttpError on a bad status when raising is on', async () => {
      const { fetch } = fakeFetch(() => jsonResponse({ error: 'not found' }, 404, 'Not Found'))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      const error = await catchError(caller.call({ url: `${BASE}/docs/nope` }))

      expect(error).to.be.instanceOf(HttpError)
      if (error instanceof HttpError) {
        expect(error.message).to.equal(`404 Not Found for url: ${BASE}/docs/nope`)
        expect(error.status).to.equal(404)
        expect(error.payload).to.deep.equal({ error: 'not found' })
      }

      expect(caller.apiCalls).to.equal(1)
    })

    it('returns plain text when the body is not JSON', async () => {
      const { fetch } = fakeFetch(() => new Response('id,name\n1,Ann\n', { headers: { 'content-type': 'text/csv' } }))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      const result = await caller.call({ url: `${BASE}/docs/d1/download/csv` })

      expect(result).to.deep.equal([200, 'id,name\n1,Ann\n'])
    })

    it('returns null for an empty body', async () => {
      const { fetch } = fakeFetch(() => new Response('', { status: 200 }))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      expect(await caller.call({ method: 'DELETE', url: `${BASE}/docs/d1`, write: true })).to.deep.equal([200, null])
    })
  })

  describe('dry run and safe mode', () => {
    it('fakes a 418 response in dry-run mode', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse(null))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })
      caller.dryRun = true

      const result = await caller.call({ body: { name: 'x' }, method: 'POST', url: `${BASE}/orgs/docs/workspaces`, write: true })

      expect(result).to.deep.equal([418, DRY_RUN_PAYLOAD])
      expect(calls).to.have.length(0)
      expect(caller.ok).to.be.false
      expect(caller.apiCalls).to.equal(0)
      expect(caller.responseAsJson()).to.equal('{"warning":"Dry run: the request was not sent"}')
    })

    it('blocks writing calls in safe mode', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse(null))
      const caller = new ApiCaller(makeConfigurator(tempDir, { GRIST_SAFEMODE: 'Y' }), { fetch })

      const error = await catchError(caller.call({ method: 'DELETE', url: `${BASE}/docs/d1`, write: true }))

      expect(error).to.be.instanceOf(SafeModeError)
      expect(calls).to.have.length(0)
      expect(caller.apiCalls).to.equal(0)
      expect(caller.ok).to.be.false
      expect(caller.transaction.request?.method).to.equal('DELETE')
      expect(caller.transaction.response?.status).to.equal(418)
    })

    it('lets reading calls through in safe mode', async () => {
      const { calls, fetch } = fakeFetch(() => jsonResponse({ id: 1 }))
      const caller = new ApiCaller(makeConfigurator(tempDir, { GRIST_SAFEMODE: 'Y' }), { fetch })

      expect(await caller.call({ url: `${BASE}/orgs/docs` })).to.deep.equal([200, { id: 1 }])
      expect(calls).to.have.length(1)
    })
  })

  describe('transport failures', () => {
    it('raises a TransportError and tags the previous response stale', async () => {
      let fail = false
      const fetch: FetchLike = async () => {
        if (fail) {
          const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' })
          throw new TypeError('fetch failed', { cause })
        }

        return jsonResponse({ id: 1 })
      }

      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })
      await caller.call({ url: `${BASE}/orgs/docs` })
      fail = true
      const error = await catchError(caller.call({ url: `${BASE}/orgs/docs/usage` }))

      expect(error).to.be.instanceOf(TransportError)
      if (error instanceof TransportError) {
        expect(error.kind).to.equal('refused')
        expect(error.message).to.equal(`Request to ${BASE}/orgs/docs/usage failed (refused): fetch failed`)
      }

      expect(caller.ok).to.be.false
      expect(caller.apiCalls).to.equal(1)
      expect(caller.responseAsJson()).to.be.null
      expect(caller.transaction.request?.url).to.equal(`${BASE}/orgs/docs/usage`)
      expect(caller.inspect().split('\n')).to.include('->Response: 200, OK (stale)')
    })

    it('raises a TransportError when the body breaks off', async () => {
      async function* brokenBody(): AsyncGenerator<Uint8Array> {
        yield new TextEncoder().encode('{"records": [')
        throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })
      }

      let broken = false
      const fetch: FetchLike = async () => (broken
        ? new Response(brokenBody(), { headers: { 'content-type': 'application/json' }, status: 200 })
        : jsonResponse({ id: 1 }))

      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })
      await caller.call({ url: `${BASE}/orgs/docs` })
      broken = true
      const error = await catchError(caller.call({ url: `${BASE}/docs/doc1/tables/People/records` }))

      expect(error).to.be.instanceOf(TransportError)
      if (error instanceof TransportError) {
        expect(error.url).to.equal(`${BASE}/docs/doc1/tables/People/records`)
        expect(error.message.startsWith(`Request to ${BASE}/docs/doc1/tables/People/records failed (`)).to.be.true
      }

      expect(caller.ok).to.be.false
      expect(caller.apiCalls).to.equal(1)
      expect(caller.responseAsJson()).to.be.null
      expect(caller.inspect().split('\n')).to.include('->Response: 200, OK (stale)')
    })

    it('classifies failures', () => {
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
      const notFound = Object.assign(new Error('getaddrinfo ENOTFOUND nowhere'), { code: 'ENOTFOUND' })

      expect(classifyTransportFailure(timeout)).to.equal('timeout')
      expect(classifyTransportFailure(new TypeError('fetch failed', { cause: notFound }))).to.equal('unreachable')
      expect(classifyTransportFailure(new Error('boom'))).to.equal('unknown')
    })
  })

  describe('inspect', () => {
    it('reports that nothing was sent yet', () => {
      const caller = new ApiCaller(makeConfigurator(tempDir))
      expect(caller.inspect()).to.equal('No API call was made yet')
    })

    it('masks the api key everywhere', async () => {
      const { fetch } = fakeFetch(() => jsonResponse({ id: 1 }))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })
      await caller.call({ url: `${BASE}/orgs/docs` })

      const lines = caller.inspect().split('\n')

      expect(lines[0]).to.equal(`->Url: ${BASE}/orgs/docs`)
      expect(lines[1]).to.equal('->Method: GET')
      expect(lines[2]).to.equal(
        '->Headers: {"Accept":"application/json","Content-Type":"application/json","Authorization":"Bearer te<7>et","Connection":"close"}'
      )
      expect(lines[4]).to.equal('->Response: 200, OK')
      expect(lines[6]).to.equal('->Resp. content: {"id":1}')
      expect(caller.inspect()).not.to.include('test-secret')
    })

    it('truncates long content', async () => {
      const { fetch } = fakeFetch(() => new Response('abcdefghij', { headers: { 'content-type': 'text/plain' } }))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })
      await caller.call({ url: `${BASE}/orgs/docs` })

      expect(caller.inspect('\n', 4).split('\n')[6]).to.equal('->Resp. content: abcd...')
    })
  })

  describe('files', () => {
    it('writes a download to disk', async () => {
      const target = join(tempDir, 'out.bin')
      const { fetch } = fakeFetch(
        () => new Response(new Uint8Array([1, 2, 3]), { headers: { 'content-type': 'application/octet-stream' } })
      )
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      const result = await caller.call({ download: target, url: `${BASE}/docs/d1/download` })

      expect(result).to.deep.equal([200, null])
      expect([...readFileSync(target)]).to.deep.equal([1, 2, 3])
      expect(caller.transaction.response?.content).to.equal('<binary content: 3 bytes>')
    })

    it('uploads files as multipart form data', async () => {
      const source = join(tempDir, 'notes.txt')
      writeFileSync(source, 'hello')
      const { calls, fetch } = fakeFetch(() => jsonResponse([7]))
      const caller = new ApiCaller(makeConfigurator(tempDir), { fetch })

      const result = await caller.call({
        method: 'POST',
        upload: { field: 'upload', filePaths: [source] },
        url: `${BASE}/docs/d1/attachments`,
        write: true,
      })

      expect(result).to.deep.equal([200, [7]])
      expect(calls[0].init?.body).to.be.instanceOf(FormData)
      expect(calls[0].init?.headers).not.to.have.property('Content-Type')
      expect(caller.transaction.request?.body).to.equal('<multipart: notes.txt>')
    })
  })
})
