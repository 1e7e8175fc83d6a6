import { expect } from 'chai'

import { logger, resolveVerbosity, VERBOSITY } from '../../src/lib/logger.js'

describe('lib/logger', () => {
  describe('resolveVerbosity', () => {
    it('returns SILENT when the silent flag is set', () => {
      expect(resolveVerbosity(0, true, {})).to.equal(VERBOSITY.SILENT)
    })

    it('returns VERBOSE for level 1', () => {
      expect(resolveVerbosity(1, false, {})).to.equal(VERBOSITY.VERBOSE)
    })

    it('returns DEBUG for level 2', () => {
      expect(resolveVerbosity(2, false, {})).to.equal(VERBOSITY.DEBUG)
    })

    it('caps the level at 3', () => {
      expect(resolveVerbosity(5, false, {})).to.equal(VERBOSITY.TRACE)
    })

    it('accepts -1 as silent', () => {
      expect(resolveVerbosity(-1, false, {})).to.equal(VERBOSITY.SILENT)
    })

    it('uses GRIST_DEBUG', () => {
      expect(resolveVerbosity(undefined, false, { GRIST_DEBUG: '1' })).to.equal(VERBOSITY.DEBUG)
      expect(resolveVerbosity(undefined, false, { GRIST_DEBUG: 'true' })).to.equal(VERBOSITY.DEBUG)
    })

    it('uses GRIST_VERBOSE', () => {
      expect(resolveVerbosity(undefined, false, { GRIST_VERBOSE: '3' })).to.equal(VERBOSITY.TRACE)
    })

    it('ignores an out of range GRIST_VERBOSE', () => {
      expect(resolveVerbosity(undefined, false, { GRIST_VERBOSE: '9' })).to.equal(VERBOSITY.NORMAL)
    })

    it('flag takes precedence over env', () => {
      expect(resolveVerbosity(1, false, { GRIST_VERBOSE: '2' })).to.equal(VERBOSITY.VERBOSE)
    })

    it('silent flag takes precedence over level', () => {
      expect(resolveVerbosity(3, true, {})).to.equal(VERBOSITY.SILENT)
    })

    it('defaults to NORMAL', () => {
      expect(resolveVerbosity(undefined, false, {})).to.equal(VERBOSITY.NORMAL)
    })
  })

  describe('logger', () => {
    afterEach(() => {
      logger.setLevel(VERBOSITY.NORMAL)
    })

    it('can set and get level', () => {
      logger.setLevel(VERBOSITY.DEBUG)
      expect(logger.getLevel()).to.equal(VERBOSITY.DEBUG)

      logger.setLevel(VERBOSITY.NORMAL)
      expect(logger.getLevel()).to.equal(VERBOSITY.NORMAL)
    })

    it('isEnabled returns true for levels at or below current', () => {
      logger.setLevel(VERBOSITY.VERBOSE)

      expect(logger.isEnabled(VERBOSITY.SILENT)).to.be.true
      expect(logger.isEnabled(VERBOSITY.NORMAL)).to.be.true
      expect(logger.isEnabled(VERBOSITY.VERBOSE)).to.be.true
      expect(logger.isEnabled(VERBOSITY.DEBUG)).to.be.false
      expect(logger.isEnabled(VERBOSITY.TRACE)).to.be.false
    })
  })
})
