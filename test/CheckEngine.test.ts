import { describe, it, expect } from 'vitest';
import { CheckEngine } from '../src/Services/CheckEngine.js';
import { ScopeBag } from '../src/Common/Command/ScopeBag.js';
import { CommandBuilder } from '../src/Common/Command/CommandBuilder.js';
import { CommandModule } from '../src/Common/Command/CommandModule.js';
import { GuildOnly, UserIn, AnyOf, DirectMessageOnly } from '../src/Common/Command/Checks.js';
import { Child, MakeContext } from './helpers/Fixtures.js';

describe('CheckEngine', () => {
    function Setup(order: string[], verdicts: Record<string, boolean> = {}) {
        const record = (name: string) => () => {
            order.push(name);
            return verdicts[name] ?? true;
        };
        const global = new ScopeBag('global').check('global', record('global'));
        const module = new CommandModule('moderation').check('module', record('module'));
        const root = new CommandBuilder('mod')
            .setDescription('Moderation')
            .check('root', record('root'))
            .addSubcommand(s => s.setName('warn').setDescription('Warn').check('leaf', record('leaf')).setHandler(() => 'warned'))
            .build();
        return { engine: new CheckEngine(global), module, node: Child(root, 'warn') };
    }

    it('should evaluate global, module, then the command lineage', async () => {
        const order: string[] = [];
        const { engine, module, node } = Setup(order);

        const outcome = await engine.Evaluate(MakeContext(), node, module);

        expect(outcome).toEqual({ allowed: true });
        expect(order).toEqual(['global', 'module', 'root', 'leaf']);
    });

    it('should stop at the first denial and report its scope', async () => {
        const order: string[] = [];
        const { engine, module, node } = Setup(order, { module: false });

        const outcome = await engine.Evaluate(MakeContext(), node, module);

        expect(order).toEqual(['global', 'module']);
        expect(outcome.allowed).toBe(false);
        if (!outcome.allowed) {
            expect(outcome.check.name).toBe('module');
            expect(outcome.scope).toBe('module');
            expect(outcome.fault).toBeUndefined();
        }
    });

    it('should treat a throwing predicate as a denial carrying the fault', async () => {
        const boom = new Error('lookup failed');
        const global = new ScopeBag('global').check('remote', async () => {
            throw boom;
        });
        const node = new CommandBuilder('ping').setDescription('Ping').setHandler(() => 'pong').build();

        const outcome = await new CheckEngine(global).Evaluate(MakeContext(), node);

        expect(outcome).toEqual({ allowed: false, check: expect.objectContaining({ name: 'remote' }), scope: 'global', fault: boom });
    });

    it('should provide ready-made checks', async () => {
        const guildCtx = MakeContext({ guildId: '200000000000000002', userId: '100000000000000001' });
        const dmCtx = MakeContext({ guildId: null });

        expect(await GuildOnly().predicate(guildCtx)).toBe(true);
        expect(await GuildOnly().predicate(dmCtx)).toBe(false);
        expect(await DirectMessageOnly().predicate(dmCtx)).toBe(true);
        expect(await UserIn(['100000000000000001']).predicate(guildCtx)).toBe(true);
        expect(await AnyOf('guild-or-dm', GuildOnly(), DirectMessageOnly()).predicate(dmCtx)).toBe(true);
        expect(await AnyOf('none', UserIn([])).predicate(guildCtx)).toBe(false);
    });
});
