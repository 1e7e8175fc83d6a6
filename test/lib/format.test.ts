import { expect } from 'chai'

import { cellText, formatErrorResponse, formatKeyValue, formatTable, formatYaml } from '../../src/lib/format.js'

describe('lib/format', () => {
  describe('cellText', () => {
    it('renders absent values as empty', () => {
      expect(cellText(null)).to.equal('')
      expect(cellText(undefined)).to.equal('')
    })

    it('renders objects as JSON', () => {
      expect(cellText(['L', 1])).to.equal('["L",1]')
    })
  })

  describe('formatTable', () => {
    it('pads columns under a dashed rule', () => {
      const output = formatTable(['id', 'name'], [
        [1, 'Ann'],
        [22, null],
      ])

      expect(output.split('\n')).to.deep.equal(['id  name', '--  ----', '1   Ann', '22'])
    })

    it('truncates wide cells', () => {
      const output = formatTable(['text'], [['x'.repeat(40)]])
      expect(output.split('\n')[2]).to.equal(`${'x'.repeat(29)}…`)
    })

    it('wraps headers in bold when styled', () => {
      const output = formatTable(['id'], [], { styled: true })
      expect(output.split('\n')[0]).to.equal('\u001B[1mid\u001B[0m')
    })
  })

  describe('formatKeyValue', () => {
    it('aligns values after the longest key', () => {
      expect(formatKeyValue([
        ['id', 3],
        ['display name', 'Ann'],
        ['email', ''],
      ])).to.equal(`${'id'.padEnd(14)}3\ndisplay name  Ann\nemail`)
    })
  })

  describe('formatYaml', () => {
    it('dumps nested objects', () => {
      const output = formatYaml({
        empty: {},
        name: 'Grist',
        user: { id: 1, tags: [] },
      })

      expect(output).to.equal('empty: {}\nname: Grist\nuser:\n  id: 1\n  tags: []')
    })

    it('dumps a list of objects', () => {
      expect(formatYaml([{ id: 1 }, 'two'])).to.equal('- id: 1\n- two')
    })

    it('dumps null', () => {
      expect(formatYaml(null)).to.equal('null')
    })
  })

  describe('formatErrorResponse', () => {
    it('prints the status and a JSON body', () => {
      expect(formatErrorResponse(404, { error: 'not found' })).to.equal('Error! Status: 404 {"error":"not found"}')
    })

    it('prints a text body as is', () => {
      expect(formatErrorResponse(521, 'connection refused')).to.equal('Error! Status: 521 connection refused')
    })
  })
})
