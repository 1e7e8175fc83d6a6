import { expect } from 'chai'

import {
  InvocationError,
  parseColumnSpecs,
  parseEvents,
  parseFieldPairs,
  parseRecordUpdate,
  parseTableOptions,
  renderOutput,
  scimUserPairs,
  toRole,
  transportStatus,
} from '../../src/lib/cli-output.js'

describe('lib/cli-output', () => {
  describe('transportStatus', () => {
    it('maps failure kinds to synthetic statuses', () => {
      expect(transportStatus('unknown')).to.equal(520)
      expect(transportStatus('refused')).to.equal(521)
      expect(transportStatus('timeout')).to.equal(522)
      expect(transportStatus('unreachable')).to.equal(523)
    })
  })

  describe('renderOutput', () => {
    it('prints the formatted content at level 0', () => {
      expect(renderOutput(0, 'Done.', { id: 1 }, '{"id":1}')).to.equal('Done.')
    })

    it('prints the payload as JSON at level 1', () => {
      expect(renderOutput(1, 'Done.', { id: 1 }, '{"id":1}')).to.equal('{\n  "id": 1\n}')
      expect(renderOutput(1, 'Done.', undefined, null)).to.equal('null')
    })

    it('prints the raw body at level 2', () => {
      expect(renderOutput(2, 'Done.', { id: 1 }, '{"id":1}')).to.equal('{"id":1}')
      expect(renderOutput(2, 'Done.', { id: 1 }, null)).to.equal('null')
    })
  })

  describe('toRole', () => {
    it('maps none to a revocation', () => {
      expect(toRole('none')).to.be.null
      expect(toRole('viewers')).to.equal('viewers')
    })
  })

  describe('parseColumnSpecs', () => {
    it('reads id, type and label', () => {
      expect(parseColumnSpecs(['age:Int:Age in years', 'note', 'when::Time: UTC'])).to.deep.equal([
        { fields: { label: 'Age in years', type: 'Int' }, id: 'age' },
        { fields: { label: 'note', type: 'Any' }, id: 'note' },
        { fields: { label: 'Time: UTC', type: 'Any' }, id: 'when' },
      ])
    })

    it('rejects a column without an id', () => {
      expect(() => parseColumnSpecs([':Int'])).to.throw(InvocationError, 'Invalid column ":Int"')
    })
  })

  describe('parseFieldPairs', () => {
    it('splits at the first colon', () => {
      expect(parseFieldPairs(['name:Ann', 'url:https://example.com'])).to.deep.equal({
        name: 'Ann',
        url: 'https://example.com',
      })
    })

    it('rejects a pair without a column', () => {
      expect(() => parseFieldPairs(['Ann'])).to.throw(InvocationError, 'Invalid field "Ann": expected col:value')
    })
  })

  describe('parseRecordUpdate', () => {
    it('separates the record id', () => {
      expect(parseRecordUpdate(['id:12', 'name:Ann'])).to.deep.equal({ fields: { name: 'Ann' }, id: 12 })
    })

    it('requires a numeric id', () => {
      expect(() => parseRecordUpdate(['name:Ann'])).to.throw(InvocationError, 'The record id must be given as id:N with N a number')
      expect(() => parseRecordUpdate(['id:x1'])).to.throw(InvocationError)
    })
  })

  describe('parseTableOptions', () => {
    it('parses booleans and integers', () => {
      expect(parseTableOptions(['onDemand=true', 'primaryViewId=3'])).to.deep.equal({ onDemand: true, primaryViewId: 3 })
    })

    it('rejects unknown keys', () => {
      expect(() => parseTableOptions(['color=red'])).to.throw(InvocationError, 'Unknown table option "color"')
    })

    it('rejects malformed values', () => {
      expect(() => parseTableOptions(['onDemand=yes'])).to.throw(InvocationError, 'Option onDemand takes true or false')
      expect(() => parseTableOptions(['primaryViewId=two'])).to.throw(InvocationError, 'Option primaryViewId takes an integer')
      expect(() => parseTableOptions(['primaryViewId'])).to.throw(InvocationError, 'expected key=value')
    })
  })

  describe('parseEvents', () => {
    it('splits on colons', () => {
      expect(parseEvents('add:update')).to.deep.equal(['add', 'update'])
      expect(parseEvents('add:')).to.deep.equal(['add'])
    })
  })

  describe('scimUserPairs', () => {
    it('lists the emails with the primary one marked', () => {
      const pairs = scimUserPairs({
        emails: [{ primary: true, value: 'ann@example.com' }, { value: 'ann@work.example.com' }],
        id: '5',
        userName: 'ann',
      })

      expect(pairs).to.deep.equal([
        ['id', '5'],
        ['name', 'ann'],
        ['display name', ''],
        ['email', 'ann@example.com (primary), ann@work.example.com'],
      ])
    })
  })
})
