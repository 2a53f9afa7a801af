import { strict as assert } from 'assert';
import { describe, it } from 'node:test';
import { parseCliArgs } from '../cli';
import { ConfigError } from '../shared/errors';

describe('parseCliArgs', () => {
    it('reads prompt and folder overrides', () => {
        assert.deepEqual(parseCliArgs(['--prompt', '2', '--audio', 'in', '--output', 'out']), {
            prompt: '2',
            audio: 'in',
            output: 'out',
            prompts: undefined,
            help: false,
        });
    });

    it('accepts the short forms', () => {
        const args = parseCliArgs(['-p', '3', '-h']);
        assert.equal(args.prompt, '3');
        assert.equal(args.help, true);
    });

    it('leaves prompt undefined when not given', () => {
        assert.equal(parseCliArgs([]).prompt, undefined);
    });

    it('rejects unknown options', () => {
        assert.throws(() => parseCliArgs(['--bogus']), ConfigError);
    });
});
