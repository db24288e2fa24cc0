/**
 * Curriculum Tests
 */

import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { Curriculum } from './Curriculum.js';
import { ConfigurationError } from '../core/errors.js';
import { TEST_CURRICULUM } from '../testing/fixtures.js';

describe('Curriculum', () => {
  describe('bundled curriculum', () => {
    const curriculum = Curriculum.load();

    it('should load the catalogue and media skills', () => {
      expect(curriculum.seedScore).toBe(0.1);
      expect(curriculum.videoSkill).toBe('video_comprehension');
      expect(curriculum.visionSkill).toBe('visual_analysis');
      expect(curriculum.reflectionSkill).toBe('self_improvement');
      expect(curriculum.skillNames()).toHaveLength(10);
      expect(curriculum.skillNames()[0]).toBe('machine_learning');
    });

    it('should rotate through a skill\'s queries by cycle', () => {
      expect(curriculum.queryFor('machine_learning', 0)).toBe('machine learning explained for beginners');
      expect(curriculum.queryFor('machine_learning', 4)).toBe('how neural networks learn from data');
    });

    it('should describe goals with the skill label', () => {
      expect(curriculum.describeGoal('machine_learning')).toBe('Deepen understanding of machine learning');
    });
  });

  describe('custom curriculum', () => {
    const curriculum = new Curriculum(TEST_CURRICULUM);

    it('should add media skills that are not in the catalogue', () => {
      expect(curriculum.skillNames()).toEqual([
        'algebra',
        'biology',
        'video_comprehension',
        'visual_analysis',
        'self_improvement'
      ]);
    });

    it('should fall back to the label for skills without queries', () => {
      expect(curriculum.queryFor('self_improvement', 3)).toBe('self improvement');
      expect(curriculum.labelFor('art_history')).toBe('art history');
    });

    it('should list every query for a skill starting from this cycle\'s', () => {
      expect(curriculum.queriesFor('algebra', 1)).toEqual(['linear equations', 'algebra basics']);
      expect(curriculum.queriesFor('algebra', 2)).toEqual(['algebra basics', 'linear equations']);
      expect(curriculum.queriesFor('visual_analysis', 1)).toEqual(['visual analysis']);
    });

    it('should resolve a focus by skill name or label', () => {
      expect(curriculum.resolveSkill('Biology')).toBe('biology');
      expect(curriculum.resolveSkill('video comprehension')).toBe('video_comprehension');
      expect(curriculum.resolveSkill('self_improvement')).toBe('self_improvement');
      expect(curriculum.resolveSkill('photosynthesis')).toBeNull();
      expect(curriculum.resolveSkill('  ')).toBeNull();
    });

    it('should credit a free-text topic to the skill its words name', () => {
      expect(curriculum.skillForTopic('History of biology in Europe')).toBe('biology');
      expect(curriculum.skillForTopic('microbiology')).toBe('self_improvement');
      expect(curriculum.skillForTopic('Renaissance painting')).toBe('self_improvement');
    });
  });

  describe('validation', () => {
    it('should reject a curriculum without skills', () => {
      let caught: unknown;
      try {
        new Curriculum({ ...TEST_CURRICULUM, skills: [] });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.problems).toHaveLength(1);
        expect(caught.problems[0].startsWith('curriculum skills:')).toBe(true);
      }
    });

    it('should report an unreadable file as a configuration error', () => {
      const missing = join('does-not-exist', 'curriculum.json');
      expect(() => Curriculum.load(missing)).toThrow(ConfigurationError);
      expect(() => Curriculum.load(missing)).toThrow(/cannot read curriculum/);
    });
  });
});
