import { expect } from 'chai'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import type { ConverterRegistry } from '../../src/lib/converters.js'

import {
  applyInputConverters,
  applyOutputConverters,
  convertOutputValue,
  loadConverterModule,
} from '../../src/lib/converters.js'
import { logger, VERBOSITY } from '../../src/lib/logger.js'

const registry: ConverterRegistry = {
  People: {
    age: value => Number(value),
    born(value) {
      if (typeof value !== 'string') throw new TypeError('not a date')
      return value.slice(0, 4)
    },
  },
}

describe('lib/converters', () => {
  describe('applyInputConverters', () => {
    it('converts the columns it has converters for', () => {
      const records = [{ age: '31', name: 'Ann' }]
      expect(applyInputConverters(registry, 'People', records)).to.deep.equal([{ age: 31, name: 'Ann' }])
      expect(records[0].age).to.equal('31')
    })

    it('does not add missing columns', () => {
      expect(applyInputConverters(registry, 'People', [{ name: 'Bob' }])).to.deep.equal([{ name: 'Bob' }])
    })

    it('returns records of other tables unchanged', () => {
      const records = [{ age: '31' }]
      expect(applyInputConverters(registry, 'Pets', records)).to.equal(records)
    })

    it('lets converter failures propagate', () => {
      expect(() => applyInputConverters(registry, 'People', [{ born: 1990 }])).to.throw(TypeError, 'not a date')
    })
  })

  describe('applyOutputConverters', () => {
    it('converts received fields', () => {
      const records = [{ born: '1990-04-01', id: 1 }]
      expect(applyOutputConverters(registry, 'People', records)).to.deep.equal([{ born: '1990', id: 1 }])
    })

    it('falls back to the string form on a type error', () => {
      expect(applyOutputConverters(registry, 'People', [{ born: 1990, id: 2 }])).to.deep.equal([{ born: '1990', id: 2 }])
    })
  })

  describe('convertOutputValue', () => {
    const failing = (): never => {
      throw new RangeError('out of range')
    }

    it('downgrades null to null', () => {
      expect(convertOutputValue(failing, null)).to.be.null
    })

    it('downgrades other values to strings', () => {
      expect(convertOutputValue(failing, 12.5)).to.equal('12.5')
    })

    it('rethrows other errors', () => {
      const broken = (): never => {
        throw new Error('bug')
      }

      expect(() => convertOutputValue(broken, 1)).to.throw(Error, 'bug')
    })
  })

  describe('loadConverterModule', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'grist-converters-'))
      logger.setLevel(VERBOSITY.SILENT)
    })

    afterEach(() => {
      logger.setLevel(VERBOSITY.NORMAL)
      rmSync(tempDir, { force: true, recursive: true })
    })

    it('returns empty registries without a module', async () => {
      expect(await loadConverterModule(tempDir)).to.deep.equal({ inConverters: {}, outConverters: {} })
    })

    it('loads the functions a module exports', async () => {
      writeFileSync(
        join(tempDir, 'gristconverters.mjs'),
        'export const inConverters = { People: { age: (v) => Number(v), note: 3 } }\n'
      )

      const { inConverters, outConverters } = await loadConverterModule(tempDir)

      expect(Object.keys(inConverters.People)).to.deep.equal(['age'])
      expect(inConverters.People.age('4')).to.equal(4)
      expect(outConverters).to.deep.equal({})
    })
  })
})
