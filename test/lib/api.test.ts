import { expect } from 'chai'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import type { FetchLike } from '../../src/lib/api/request.js'

import { GristApi } from '../../src/lib/api/index.js'
import { flattenRecords } from '../../src/lib/api/records.js'
import { ApiCaller } from '../../src/lib/api/request.js'
import { jsonizeColumnOptions } from '../../src/lib/api/tables.js'
import { Configurator } from '../../src/lib/config.js'
import { ConfigurationError } from '../../src/lib/errors.js'

interface RecordedCall {
  body: unknown
  method: string
  url: string
}

const SERVER = 'https://acme.getgrist.com/api'

/**
 * Answers each call with the next queued body, recording what was sent
 */
function scriptedFetch(bodies: unknown[]): { calls: RecordedCall[]; fetch: FetchLike } {
  const calls: RecordedCall[] = []
  const queue = [...bodies]
  return {
    calls,
    async fetch(url, init) {
      const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
      calls.push({ body, method: init?.method ?? 'GET', url })
      return new Response(JSON.stringify(queue.shift() ?? null), {
        headers: { 'content-type': 'application/json' },
        status: 200,
      })
    },
  }
}

describe('lib/api', () => {
  let tempDir: string
  let configurator: Configurator

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'grist-api-'))
    configurator = new Configurator(
      { GRIST_API_KEY: 'test-secret', GRIST_DOC_ID: 'doc1', GRIST_TEAM_SITE: 'acme', GRIST_WORKSPACE_ID: '7' },
      { configPath: join(tempDir, 'missing.json'), env: {} }
    )
  })

  afterEach(() => {
    rmSync(tempDir, { force: true, recursive: true })
  })

  describe('construction', () => {
    it('accepts at most one configuration source', () => {
      expect(() => new GristApi({ config: { GRIST_DOC_ID: 'x' }, configurator })).to.throw(
        ConfigurationError,
        'Pass at most one of "config", "configurator" and "caller"'
      )
    })

    it('shares the configurator of a given caller', () => {
      const caller = new ApiCaller(configurator)
      const api = new GristApi({ caller })
      expect(api.caller).to.equal(caller)
      expect(api.configurator).to.equal(configurator)
    })

    it('sees configuration updates in later calls', async () => {
      const { calls, fetch } = scriptedFetch([{ tables: [] }])
      const api = new GristApi({ configurator, fetch })

      api.updateConfig({ GRIST_DOC_ID: 'doc2' })
      await api.listTables()

      expect(calls[0].url).to.equal(`${SERVER}/docs/doc2/tables`)
    })
  })

  describe('records', () => {
    it('lists records flattened with their id', async () => {
      const { calls, fetch } = scriptedFetch([{ records: [{ fields: { name: 'Ann' }, id: 1 }] }])
      const api = new GristApi({ configurator, fetch })

      const result = await api.listRecords('People', { filter: { name: ['Ann'] } })

      expect(result).to.deep.equal([200, [{ id: 1, name: 'Ann' }]])
      expect(calls[0].url).to.equal(`${SERVER}/docs/doc1/tables/People/records?filter=%7B%22name%22%3A%5B%22Ann%22%5D%7D`)
    })

    it('adds records and returns their ids', async () => {
      const { calls, fetch } = scriptedFetch([{ records: [{ id: 4 }, { id: 5 }] }])
      const api = new GristApi({ configurator, fetch })

      const result = await api.addRecords('People', [{ name: 'Ann' }, { name: 'Bob' }])

      expect(result).to.deep.equal([200, [4, 5]])
      expect(calls[0].method).to.equal('POST')
      expect(calls[0].url).to.equal(`${SERVER}/docs/doc1/tables/People/records?noparse=false`)
      expect(calls[0].body).to.deep.equal({ records: [{ fields: { name: 'Ann' } }, { fields: { name: 'Bob' } }] })
    })

    it('splits the id from the fields on update', async () => {
      const { calls, fetch } = scriptedFetch([null])
      const api = new GristApi({ configurator, fetch })

      await api.updateRecords('People', [{ id: 3, name: 'Cid' }], true)

      expect(calls[0].method).to.equal('PATCH')
      expect(calls[0].url).to.equal(`${SERVER}/docs/doc1/tables/People/records?noparse=true`)
      expect(calls[0].body).to.deep.equal({ records: [{ fields: { name: 'Cid' }, id: 3 }] })
    })

    it('deletes rows by id', async () => {
      const { calls, fetch } = scriptedFetch([null])
      const api = new GristApi({ configurator, fetch })

      await api.deleteRows('People', [1, 2], 'other')

      expect(calls[0]).to.deep.equal({ body: [1, 2], method: 'POST', url: `${SERVER}/docs/other/tables/People/data/delete` })
    })

    it('runs input converters before sending', async () => {
      const { calls, fetch } = scriptedFetch([{ records: [{ id: 1 }] }])
      const api = new GristApi({ configurator, fetch, inConverter: { People: { age: value => Number(value) } } })

      await api.addRecords('People', [{ age: '40' }])

      expect(calls[0].body).to.deep.equal({ records: [{ fields: { age: 40 } }] })
    })

    it('sends nothing when an input converter fails', async () => {
      const { calls, fetch } = scriptedFetch([])
      const api = new GristApi({ configurator, fetch })
      api.inConverter = {
        People: {
          age() {
            throw new RangeError('bad age')
          },
        },
      }

      let caught: unknown
      try {
        await api.addRecords('People', [{ age: 1 }, { age: 2 }])
      } catch (error) {
        caught = error
      }

      expect(caught).to.be.instanceOf(RangeError)
      expect(calls).to.have.length(0)
      expect(api.apiCalls).to.equal(0)
    })

    it('runs output converters on received records', async () => {
      const { fetch } = scriptedFetch([{ records: [{ fields: { age: '40' }, id: 1 }] }])
      const api = new GristApi({ configurator, fetch, outConverter: { People: { age: value => Number(value) } } })

      expect(await api.listRecords('People')).to.deep.equal([200, [{ age: 40, id: 1 }]])
    })

    it('flattens records', () => {
      expect(flattenRecords([{ fields: { a: 1 }, id: 2 }, 'junk', { id: '3' }])).to.deep.equal([
        { a: 1, id: 2 },
        { id: 3 },
      ])
    })
  })

  describe('sql', () => {
    it('converts sql rows with the reserved converter key', async () => {
      const { calls, fetch } = scriptedFetch([{ records: [{ fields: { n: '2' } }] }])
      const api = new GristApi({ configurator, fetch, outConverter: { $SQL: { n: value => Number(value) } } })

      const result = await api.runSqlWithArgs('select n from T where x = ?', [1], 500)

      expect(result).to.deep.equal([200, [{ n: 2 }]])
      expect(calls[0].method).to.equal('POST')
      expect(calls[0].body).to.deep.equal({ args: [1], sql: 'select n from T where x = ?', timeout: 500 })
    })
  })

  describe('tables and columns', () => {
    it('unwraps the table list', async () => {
      const { fetch } = scriptedFetch([{ tables: [{ fields: {}, id: 'People' }] }])
      const api = new GristApi({ configurator, fetch })

      expect(await api.listTables()).to.deep.equal([200, [{ fields: {}, id: 'People' }]])
    })

    it('sends widget options as a JSON string', () => {
      const cols = jsonizeColumnOptions([{ fields: { type: 'Text', widgetOptions: { alignment: 'left' } }, id: 'name' }])
      expect(cols).to.deep.equal([{ fields: { type: 'Text', widgetOptions: '{"alignment":"left"}' }, id: 'name' }])
    })

    it('adds columns and returns their ids', async () => {
      const { calls, fetch } = scriptedFetch([{ columns: [{ id: 'age' }] }])
      const api = new GristApi({ configurator, fetch })

      const result = await api.addCols('People', [{ fields: { type: 'Int' }, id: 'age' }])

      expect(result).to.deep.equal([200, ['age']])
      expect(calls[0].url).to.equal(`${SERVER}/docs/doc1/tables/People/columns`)
    })
  })

  describe('sites and documents', () => {
    it('uses the configured workspace', async () => {
      const { calls, fetch } = scriptedFetch([{ id: 7, name: 'Home' }])
      const api = new GristApi({ configurator, fetch })

      await api.seeWorkspace()
      await api.seeWorkspace(9, 'other')

      expect(calls.map(call => call.url)).to.deep.equal([`${SERVER}/workspaces/7`, 'https://other.getgrist.com/api/workspaces/9'])
    })

    it('sends access deltas', async () => {
      const { calls, fetch } = scriptedFetch([null])
      const api = new GristApi({ configurator, fetch })

      await api.updateDocUsers({ 'ann@example.com': 'editors', 'bob@example.com': null }, null)

      expect(calls[0].body).to.deep.equal({
        delta: { maxInheritedRole: null, users: { 'ann@example.com': 'editors', 'bob@example.com': null } },
      })
    })

    it('unwraps the user list of a team', async () => {
      const users = [{ access: 'owners', email: 'ann@example.com', id: 1, name: 'Ann' }]
      const { calls, fetch } = scriptedFetch([{ users }])
      const api = new GristApi({ configurator, fetch })

      expect(await api.listTeamUsers()).to.deep.equal([200, users])
      expect(calls[0].url).to.equal(`${SERVER}/orgs/acme/access`)
    })
  })

  describe('webhooks', () => {
    it('wraps each webhook in fields', async () => {
      const { calls, fetch } = scriptedFetch([{ webhooks: [{ id: 'hook-1' }] }])
      const api = new GristApi({ configurator, fetch })

      const result = await api.addWebhooks([{ eventTypes: ['add'], name: 'h', tableId: 'People', url: 'https://example.com/h' }])

      expect(result).to.deep.equal([200, ['hook-1']])
      expect(calls[0].body).to.deep.equal({
        webhooks: [{ fields: { eventTypes: ['add'], name: 'h', tableId: 'People', url: 'https://example.com/h' } }],
      })
    })
  })

  describe('users', () => {
    it('pages through SCIM users', async () => {
      const page = (ids: string[]): unknown => ({
        Resources: ids.map(id => ({ id, userName: `user${id}` })),
        totalResults: 3,
      })
      const { calls, fetch } = scriptedFetch([page(['1', '2']), page(['3'])])
      const api = new GristApi({ configurator, fetch })
      const names: string[] = []

      for await (const [, users] of api.listUsers(1, 2)) {
        names.push(...users.map(user => user.userName))
      }

      expect(names).to.deep.equal(['user1', 'user2', 'user3'])
      expect(calls.map(call => call.url)).to.deep.equal([
        `${SERVER}/scim/v2/Users?count=2&startIndex=1`,
        `${SERVER}/scim/v2/Users?count=2&startIndex=3`,
      ])
    })
  })

  describe('dry run', () => {
    it('is shared with the engine', async () => {
      const { calls, fetch } = scriptedFetch([])
      const api = new GristApi({ configurator, fetch })
      api.dryRun = true

      const [status] = await api.deleteDoc()

      expect(status).to.equal(418)
      expect(api.ok).to.be.false
      expect(calls).to.have.length(0)
    })
  })
})
