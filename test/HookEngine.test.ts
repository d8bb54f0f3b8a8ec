import { describe, it, expect } from 'vitest';
import { HookEngine } from '../src/Services/HookEngine.js';
import { ScopeBag } from '../src/Common/Command/ScopeBag.js';
import { CommandBuilder } from '../src/Common/Command/CommandBuilder.js';
import { CommandModule } from '../src/Common/Command/CommandModule.js';
import { HookFaultError, InternalError } from '../src/Common/Errors.js';
import type { ErrorHookOrder, ErrorHookStrategy } from '../src/Types/Config.js';
import { MakeContext } from './helpers/Fixtures.js';

interface Scenario {
    order: string[];
    global: ScopeBag;
    module: CommandModule;
    command: CommandBuilder;
}

function Scenario(): Scenario {
    return {
        order: [],
        global: new ScopeBag('global'),
        module: new CommandModule('moderation'),
        command: new CommandBuilder('warn').setDescription('Warn').setHandler(() => 'warned'),
    };
}

function Engine(s: Scenario, errorHookOrder: ErrorHookOrder = 'specific-first', errorHookStrategy: ErrorHookStrategy = 'all') {
    const engine = new HookEngine(s.global, { errorHookOrder, errorHookStrategy });
    return { engine, chain: engine.Chain(s.command.build(), s.module) };
}

describe('HookEngine', () => {
    it('should run pre-run and post-run hooks global, module, command in registration order', async () => {
        const s = Scenario();
        for (const scope of ['global', 'module', 'command'] as const) {
            const target = scope === 'global' ? s.global : scope === 'module' ? s.module : s.command;
            target.onPreRun(() => {
                s.order.push(`pre:${scope}:1`);
            }, `${scope}-1`);
            target.onPreRun(() => {
                s.order.push(`pre:${scope}:2`);
            }, `${scope}-2`);
            target.onPostRun(() => {
                s.order.push(`post:${scope}`);
            });
        }
        const { engine, chain } = Engine(s);
        const ctx = MakeContext();

        const pre = await engine.RunPreRun(chain, ctx, {});
        const post = await engine.RunPostRun(chain, ctx, {}, { ok: true, value: 'warned' });

        expect(pre).toEqual({ ran: 6, faults: [] });
        expect(post).toEqual({ ran: 3, faults: [] });
        expect(s.order).toEqual([
            'pre:global:1',
            'pre:global:2',
            'pre:module:1',
            'pre:module:2',
            'pre:command:1',
            'pre:command:2',
            'post:global',
            'post:module',
            'post:command',
        ]);
    });

    it('should stop pre-run hooks at the first fault', async () => {
        const s = Scenario();
        s.module.onPreRun(() => {
            throw new Error('quota exceeded');
        }, 'quota');
        s.command.onPreRun(() => {
            s.order.push('command');
        });
        const { engine, chain } = Engine(s);

        const report = await engine.RunPreRun(chain, MakeContext(), {});

        expect(report.ran).toBe(1);
        expect(s.order).toEqual([]);
        expect(report.faults[0]).toBeInstanceOf(HookFaultError);
        expect(report.faults[0]?.details).toEqual({ stage: 'preRun', scope: 'module', hook: 'quota' });
        expect(report.faults[0]?.message).toBe("preRun hook 'quota' (module) failed: quota exceeded");
    });

    it('should keep running post-run hooks after a fault', async () => {
        const s = Scenario();
        s.global.onPostRun(() => {
            throw new Error('audit offline');
        });
        s.command.onPostRun(() => {
            s.order.push('command');
        });
        const { engine, chain } = Engine(s);

        const report = await engine.RunPostRun(chain, MakeContext(), {}, { ok: true });

        expect(report.ran).toBe(2);
        expect(report.faults).toHaveLength(1);
        expect(s.order).toEqual(['command']);
    });

    describe('error routing', () => {
        function WithErrorHooks(s: Scenario, scopes: Array<'global' | 'module' | 'command'>): void {
            for (const scope of scopes) {
                const target = scope === 'global' ? s.global : scope === 'module' ? s.module : s.command;
                target.onError(() => {
                    s.order.push(scope);
                });
            }
        }

        it('should run the most specific scope first by default', async () => {
            const s = Scenario();
            WithErrorHooks(s, ['global', 'module', 'command']);
            const { engine, chain } = Engine(s);

            const report = await engine.RunError(chain, new InternalError('boom'), MakeContext());

            expect(s.order).toEqual(['command', 'module', 'global']);
            expect(report).toEqual({ ran: 3, faults: [], handled: true });
        });

        it('should run the most general scope first when configured', async () => {
            const s = Scenario();
            WithErrorHooks(s, ['global', 'module', 'command']);
            const { engine, chain } = Engine(s, 'general-first');

            await engine.RunError(chain, new InternalError('boom'), MakeContext());

            expect(s.order).toEqual(['global', 'module', 'command']);
        });

        it('should only run the nearest scope with error hooks when configured', async () => {
            const s = Scenario();
            WithErrorHooks(s, ['global', 'module']);
            const { engine, chain } = Engine(s, 'specific-first', 'nearest');

            await engine.RunError(chain, new InternalError('boom'), MakeContext());

            expect(s.order).toEqual(['module']);
        });

        it('should report unhandled faults when no error hook exists', async () => {
            const { engine, chain } = Engine(Scenario());

            expect(await engine.RunError(chain, new InternalError('boom'), MakeContext())).toEqual({
                ran: 0,
                faults: [],
                handled: false,
            });
        });

        it('should report faults raised by error hooks and keep going', async () => {
            const s = Scenario();
            s.command.onError(() => {
                throw new Error('reporter down');
            }, 'report');
            WithErrorHooks(s, ['global']);
            const received: unknown[] = [];
            s.global.onError(f => {
                received.push(f);
            });
            const { engine, chain } = Engine(s);
            const fault = new InternalError('boom');

            const report = await engine.RunError(chain, fault, MakeContext());

            expect(s.order).toEqual(['global']);
            expect(received).toEqual([fault]);
            expect(report.handled).toBe(true);
            expect(report.faults.map(f => f.details)).toEqual([{ stage: 'error', scope: 'command', hook: 'report' }]);
        });
    });
});
