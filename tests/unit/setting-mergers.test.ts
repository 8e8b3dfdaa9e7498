import { describe, expect, it } from 'vitest';
import {
    MalformedSettingError,
    SettingMergeOutcome,
    mergeSettingValue
} from '../../src/features/backup/mergers/setting-mergers';

/** Decoded JSON of a write outcome. */
function written(outcome: SettingMergeOutcome): unknown {
    if (outcome.kind !== 'write') throw new Error('expected a write');
    return typeof outcome.value === 'string' ? JSON.parse(outcome.value) : outcome.value;
}

describe('Setting mergers', () => {
    describe('assistants_v1', () => {
        it('should keep a local avatar while taking other incoming fields', () => {
            const local = JSON.stringify([{ id: 'a', name: 'Old', avatar: 'local.png' }]);
            const incoming = JSON.stringify([
                { id: 'a', name: 'New', avatar: 'remote.png' },
                { id: 'b', name: 'B' }
            ]);

            expect(written(mergeSettingValue('assistants_v1', local, incoming))).toEqual([
                { id: 'a', name: 'New', avatar: 'local.png', background: null },
                { id: 'b', name: 'B' }
            ]);
        });

        it('should take the incoming avatar and background when the local ones are blank', () => {
            const local = JSON.stringify([{ id: 'a', avatar: '   ', background: '' }]);
            const incoming = JSON.stringify([{ id: 'a', avatar: 'remote.png', background: 'sky.jpg' }]);

            expect(written(mergeSettingValue('assistants_v1', local, incoming))).toEqual([
                { id: 'a', avatar: 'remote.png', background: 'sky.jpg' }
            ]);
        });

        it('should drop entries without an id', () => {
            const local = JSON.stringify([{ name: 'nameless' }, { id: 1, name: 'One' }]);
            const incoming = JSON.stringify([{ name: 'also nameless' }, { id: 'two', name: 'Two' }]);

            expect(written(mergeSettingValue('assistants_v1', local, incoming))).toEqual([
                { id: 1, name: 'One' },
                { id: 'two', name: 'Two' }
            ]);
        });
    });

    it('should let incoming provider configs win per provider', () => {
        const local = JSON.stringify({ openai: { key: 'local' }, ollama: { host: 'localhost' } });
        const incoming = JSON.stringify({ openai: { key: 'remote' } });

        expect(written(mergeSettingValue('provider_configs_v1', local, incoming))).toEqual({
            openai: { key: 'remote' },
            ollama: { host: 'localhost' }
        });
    });

    it('should union pinned models with local order first', () => {
        const local = JSON.stringify(['gpt', 'claude']);
        const incoming = JSON.stringify(['gemini', 'gpt', 7]);

        expect(written(mergeSettingValue('pinned_models_v1', local, incoming))).toEqual(['gpt', 'claude', 'gemini']);
    });

    it('should append only new tags and treat a blank local value as empty', () => {
        const local = JSON.stringify([{ id: 't1', name: 'Work' }]);
        const incoming = JSON.stringify([{ id: 't2', name: 'Home' }, { id: 't1', name: 'Renamed' }]);

        expect(written(mergeSettingValue('assistant_tags_v1', local, incoming))).toEqual([
            { id: 't1', name: 'Work' },
            { id: 't2', name: 'Home' }
        ]);
        expect(written(mergeSettingValue('assistant_tags_v1', '', incoming))).toEqual([
            { id: 't2', name: 'Home' },
            { id: 't1', name: 'Renamed' }
        ]);
    });

    it('should prefer local entries in the tag map', () => {
        const local = JSON.stringify({ a1: 't1' });
        const incoming = JSON.stringify({ a1: 't9', a2: 't2' });

        expect(written(mergeSettingValue('assistant_tag_map_v1', local, incoming))).toEqual({ a1: 't1', a2: 't2' });
    });

    it('should replace provider order with the incoming value', () => {
        const incoming = JSON.stringify(['b', 'a']);

        expect(mergeSettingValue('providers_order_v1', JSON.stringify(['a', 'b', 'c']), incoming))
            .toEqual({ kind: 'write', value: incoming });
    });

    it('should write the incoming value of a mergeable key that is absent locally', () => {
        const incoming = JSON.stringify([{ id: 'x' }]);

        expect(mergeSettingValue('assistants_v1', undefined, incoming)).toEqual({ kind: 'write', value: incoming });
    });

    it('should only add other keys when they are absent', () => {
        expect(mergeSettingValue('theme_mode', 'dark', 'light')).toEqual({ kind: 'keep' });
        expect(mergeSettingValue('theme_mode', undefined, 'light')).toEqual({ kind: 'write', value: 'light' });
        expect(mergeSettingValue('quick_phrases_v1', '[]', '[{"id":"q"}]')).toEqual({ kind: 'keep' });
    });

    it('should reject malformed JSON', () => {
        expect(() => mergeSettingValue('provider_configs_v1', '{"ok":1}', '{broken'))
            .toThrow(MalformedSettingError);
        expect(() => mergeSettingValue('pinned_models_v1', '{"not":"a list"}', '[]'))
            .toThrow(MalformedSettingError);
    });
});
