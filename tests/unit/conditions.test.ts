/**
 * Index Condition Test Suite
 */

import { describe, it, expect, beforeEach } from 'vitest'
import * as conditions from '../../src/conditions'
import { model } from '../../src/model/model'
import { props } from '../../src/properties'
import { createMemoryAdapter } from '../helpers'

const Task = model('Task', {
  done: props.bool({ indexedIf: conditions.isTrue }),
  priority: props.integer({ default: 1, indexedIf: conditions.isNotDefault }),
  note: props.string({ optional: true, indexedIf: conditions.isNotNone }),
})

const { done, priority, note } = Task.properties

describe('index conditions', () => {
  // ===========================================================================
  // Predicates
  // ===========================================================================

  describe('predicates', () => {
    it('should report unassigned properties as empty', () => {
      const task = new Task()

      expect(conditions.isEmpty(task, note, 'note')).toBe(true)
      expect(conditions.isNotEmpty(task, note, 'note')).toBe(false)
      expect(conditions.isNone(task, note, 'note')).toBe(false)
    })

    it('should tell null apart from unassigned', () => {
      const task = new Task({ note: null })

      expect(conditions.isEmpty(task, note, 'note')).toBe(false)
      expect(conditions.isNone(task, note, 'note')).toBe(true)
      expect(conditions.isNotNone(task, note, 'note')).toBe(false)
    })

    it('should compare against the default', () => {
      expect(conditions.isDefault(new Task(), priority, 'priority')).toBe(true)
      expect(conditions.isDefault(new Task({ priority: 1 }), priority, 'priority')).toBe(true)
      expect(conditions.isNotDefault(new Task({ priority: 2 }), priority, 'priority')).toBe(true)
    })

    it('should test assigned truthiness', () => {
      expect(conditions.isTrue(new Task({ done: true }), done, 'done')).toBe(true)
      expect(conditions.isFalse(new Task({ done: false }), done, 'done')).toBe(true)
      expect(conditions.isTrue(new Task(), done, 'done')).toBe(false)
      expect(conditions.isFalse(new Task(), done, 'done')).toBe(false)
    })
  })

  // ===========================================================================
  // Indexing
  // ===========================================================================

  describe('indexing', () => {
    it('should leave properties unindexed when their condition fails', () => {
      expect(new Task().unindexedProperties).toEqual(['done', 'priority', 'note'])
      expect(new Task({ done: false, priority: 1, note: null }).unindexedProperties).toEqual(['done', 'priority', 'note'])
    })

    it('should index properties whose condition holds', () => {
      expect(new Task({ done: true, priority: 2, note: 'call back' }).unindexedProperties).toEqual([])
    })

    it('should treat conditional properties as indexed for filters', () => {
      expect(done.indexed).toBe(true)
      expect(done.eq(true).value).toBe(true)
    })

    describe('queries', () => {
      beforeEach(async () => {
        createMemoryAdapter()
        await new Task({ done: true, priority: 1 }).put()
        await new Task({ done: false, priority: 3, note: 'urgent' }).put()
      })

      it('should only match entities indexed under the condition', async () => {
        const finished = await Task.query().where(done.eq(true)).run({ keysOnly: true }).toArray()
        const unfinished = await Task.query().where(done.eq(false)).run({ keysOnly: true }).toArray()

        expect(finished.map(key => key.intId)).toEqual([1])
        expect(unfinished).toEqual([])
      })

      it('should skip values equal to the default', async () => {
        const tasks = await Task.query().where(priority.ge(1)).run().toArray()
        expect(tasks.map(task => task.priority)).toEqual([3])
      })

      it('should skip unset optional values', async () => {
        const tasks = await Task.query().where(note.eq('urgent')).run().toArray()
        expect(tasks.map(task => task.note)).toEqual(['urgent'])
      })
    })
  })
})
