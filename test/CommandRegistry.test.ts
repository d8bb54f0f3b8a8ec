import { describe, it, expect, beforeEach } from 'vitest';
import { CommandRegistry } from '../src/Services/CommandRegistry.js';
import { CommandBuilder } from '../src/Common/Command/CommandBuilder.js';
import { DuplicateCommandError, InvalidSchemaError, UnknownCommandError } from '../src/Common/Errors.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { Leaf } from './helpers/Fixtures.js';

function Group(name: string, ...subcommands: string[]): CommandBuilder {
    const builder = new CommandBuilder(name).setDescription(`${name} group`);
    for (const sub of subcommands) {
        builder.addSubcommand(s => s.setName(sub).setDescription(`${sub} subcommand`).setHandler(() => sub));
    }
    return builder;
}

function SchemaRule(register: () => void): unknown {
    try {
        register();
    } catch(err) {
        if (err instanceof InvalidSchemaError) {
            return err.details?.rule;
        }
        throw err;
    }
    return undefined;
}

describe('CommandRegistry', () => {
    let registry: CommandRegistry;

    beforeEach(() => {
        registry = new CommandRegistry({ eventBus: new MainEventBus() });
    });

    describe('registration and resolution', () => {
        it('should resolve a registered top-level command', () => {
            const ping = Leaf('ping').build();
            registry.Register(ping);

            expect(registry.Resolve({ name: 'ping' })).toBe(ping);
            expect(registry.Stats()).toEqual({ roots: 1, invokable: 1, registrations: 1, removals: 0, failures: 0 });
        });

        it('should reject a duplicate in the same scope and leave the registry unchanged', () => {
            const first = Leaf('ping').build();
            registry.Register(first);

            expect(() => registry.Register(Leaf('ping').build())).toThrow(DuplicateCommandError);
            expect(registry.Resolve({ name: 'ping' })).toBe(first);
            expect(registry.Stats().failures).toBe(1);
            expect(registry.List()).toHaveLength(1);
        });

        it('should prefer a guild registration over a global one', () => {
            const global = Leaf('ping').build();
            const guild = Leaf('ping').setScopes('111111111111111111').build();
            registry.Register(global);
            registry.Register(guild);

            expect(registry.Resolve({ name: 'ping' }, '111111111111111111')).toBe(guild);
            expect(registry.Resolve({ name: 'ping' }, '222222222222222222')).toBe(global);
            expect(registry.Resolve({ name: 'ping' }, null)).toBe(global);
        });

        it('should not expose guild commands in direct messages', () => {
            registry.Register(Leaf('report').setScopes('111111111111111111').build());

            expect(() => registry.Resolve({ name: 'report' }, null)).toThrow(UnknownCommandError);
        });

        it('should never resolve a group as an invocation target', () => {
            registry.Register(Group('config', 'show').build());

            expect(() => registry.Resolve({ name: 'config' })).toThrow(UnknownCommandError);
            expect(registry.Resolve({ name: 'config', subcommand: 'show' }).name).toBe('show');
        });

        it('should resolve the top-level command when a group shares its name', () => {
            const leaf = Leaf('config').build();
            registry.Register(Group('config', 'show').build());
            registry.Register(leaf);

            expect(registry.Resolve({ name: 'config' })).toBe(leaf);
            expect(registry.ResolveString('config show').kind).toBe('subcommand');
        });

        it('should reject a second root group with the same name', () => {
            registry.Register(Group('config', 'show').build());

            expect(() => registry.Register(Group('config', 'reset').build())).toThrow(DuplicateCommandError);
            expect(registry.Has({ name: 'config', subcommand: 'reset' })).toBe(false);
        });

        it('should resolve subcommands nested in a group', () => {
            const root = new CommandBuilder('settings')
                .setDescription('Settings')
                .addSubcommandGroup(group =>
                    group
                        .setName('channel')
                        .setDescription('Channel settings')
                        .addSubcommand(sub => sub.setName('set').setDescription('Set it').setHandler(() => 'set')),
                )
                .build();
            registry.Register(root);

            const node = registry.ResolveString('settings channel set');
            expect(node.name).toBe('set');
            expect(node.parent?.name).toBe('channel');
            expect(() => registry.ResolveString('settings channel')).toThrow(UnknownCommandError);
        });

        it('should store nothing when one scope of a tree collides', () => {
            registry.Register(Group('admin', 'ban').setScopes('222222222222222222').build());

            const tree = Group('admin', 'kick', 'ban').setScopes('111111111111111111', '222222222222222222').build();
            expect(() => registry.Register(tree)).toThrow(DuplicateCommandError);
            expect(registry.Has({ name: 'admin', subcommand: 'kick' }, '111111111111111111')).toBe(false);
            expect(registry.Has({ name: 'admin', subcommand: 'kick' }, '222222222222222222')).toBe(false);
        });

        it('should match names regardless of case when configured', () => {
            const insensitive = new CommandRegistry({ caseInsensitive: true, eventBus: new MainEventBus() });
            const ping = Leaf('ping').build();
            insensitive.Register(ping);

            expect(insensitive.Resolve({ name: 'PING' })).toBe(ping);
            expect(() => registry.Resolve({ name: 'PING' })).toThrow(UnknownCommandError);
        });
    });

    describe('schema validation', () => {
        it('should reject a required option after an optional one', () => {
            const node = Leaf('roll')
                .addStringOption(o => o.setName('label').setDescription('Label'))
                .addIntegerOption(o => o.setName('sides').setDescription('Sides').setRequired(true))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('option-order');
            expect(registry.List()).toHaveLength(0);
        });

        it('should reject choices on a boolean option', () => {
            const node = Leaf('toggle')
                .addBooleanOption(o => o.setName('flag').setDescription('Flag').addChoice('yes', 'y'))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('choices-type');
        });

        it('should reject autocomplete combined with choices', () => {
            const node = Leaf('pick')
                .addStringOption(o => o.setName('item').setDescription('Item').addChoice('a', 'a').setAutocomplete(true))
                .autocomplete('item', () => [])
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('autocomplete-choices');
        });

        it('should reject an autocomplete option without a callback', () => {
            const node = Leaf('search')
                .addStringOption(o => o.setName('query').setDescription('Query').setAutocomplete(true))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('autocomplete-callback');
        });

        it('should reject inverted numeric bounds', () => {
            const node = Leaf('range')
                .addIntegerOption(o => o.setName('count').setDescription('Count').setMinValue(20).setMaxValue(10))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('value-bounds-order');
        });

        it('should reject more than 25 options', () => {
            const builder = Leaf('wide');
            for (let i = 0; i < 26; i++) {
                builder.addStringOption(o => o.setName(`opt-${i}`).setDescription('Option'));
            }

            expect(SchemaRule(() => registry.Register(builder.build()))).toBe('options-count');
        });

        it('should reject uppercase names', () => {
            expect(SchemaRule(() => registry.Register(Leaf('Ping').build()))).toBe('name');
        });

        it('should reject an empty nested group', () => {
            const node = new CommandBuilder('root')
                .setDescription('Root')
                .addSubcommandGroup(g => g.setName('empty').setDescription('Empty'))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('group-empty');
        });

        it('should reject groups nested more than one level', () => {
            const node = new CommandBuilder('root')
                .setDescription('Root')
                .addSubcommandGroup(outer =>
                    outer
                        .setName('outer')
                        .setDescription('Outer')
                        .addSubcommandGroup(inner =>
                            inner
                                .setName('inner')
                                .setDescription('Inner')
                                .addSubcommand(s => s.setName('leaf').setDescription('Leaf').setHandler(() => 'x')),
                        ),
                )
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('depth');
        });

        it('should reject a command without a handler', () => {
            const node = new CommandBuilder('noop').setDescription('Nothing').build();

            expect(SchemaRule(() => registry.Register(node))).toBe('handler');
        });

        it('should reject defaults outside the bounds of their option', () => {
            const node = Leaf('roll')
                .addIntegerOption(o => o.setName('count').setDescription('Count').setMinValue(10).setMaxValue(15).setDefault(99))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('default-value');
        });

        it('should reject defaults that are not a declared choice', () => {
            const node = Leaf('mode')
                .addStringOption(o =>
                    o.setName('mode').setDescription('Mode').addChoice('Fast', 'fast').addChoice('Safe', 'safe').setDefault('zzz'),
                )
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('default-value');
        });

        it('should reject defaults of the wrong type', () => {
            const node = Leaf('limit')
                .addIntegerOption(o => o.setName('limit').setDescription('Limit').setDefault('12'))
                .build();

            expect(SchemaRule(() => registry.Register(node))).toBe('default-value');
        });

        it('should accept defaults that satisfy their option', () => {
            const node = Leaf('roll')
                .addIntegerOption(o => o.setName('count').setDescription('Count').setMinValue(10).setMaxValue(15).setDefault(12))
                .addStringOption(o => o.setName('mode').setDescription('Mode').addChoice('Fast', 'fast').setDefault('fast'))
                .build();

            registry.Register(node);

            expect(registry.Has({ name: 'roll' })).toBe(true);
        });

        it('should reject a root without scopes and count the failure', () => {
            const node = { ...Leaf('ping').build(), scopes: [] };

            expect(SchemaRule(() => registry.Register(node))).toBe('scopes');
            expect(registry.Stats()).toMatchObject({ roots: 0, registrations: 0, failures: 1 });
        });
    });

    describe('removal and listing', () => {
        it('should unregister idempotently', () => {
            registry.Register(Leaf('ping').build());

            expect(registry.Unregister('ping')).toBe(1);
            expect(registry.Unregister('ping')).toBe(0);
            expect(() => registry.Resolve({ name: 'ping' })).toThrow(UnknownCommandError);
        });

        it('should unregister from a single scope only', () => {
            registry.Register(Leaf('ping').setScopes('global', '111111111111111111').build());

            expect(registry.Unregister('ping', '111111111111111111')).toBe(1);
            expect(registry.Has({ name: 'ping' }, null)).toBe(true);
            expect(registry.List('111111111111111111')).toHaveLength(0);
        });

        it('should list roots of a scope in registration order', () => {
            registry.Register(Leaf('beta').build());
            registry.Register(Leaf('alpha').build());
            registry.Register(Leaf('gamma').setScopes('111111111111111111').build());

            expect(registry.List('global').map(n => n.name)).toEqual(['beta', 'alpha']);
            expect(registry.List().map(n => n.name)).toEqual(['beta', 'alpha', 'gamma']);
            expect(registry.Scopes()).toEqual(['global', '111111111111111111']);
        });

        it('should emit registration lifecycle events', () => {
            const bus = new MainEventBus();
            const seen: Array<Record<string, unknown>> = [];
            bus.On(EVENT_NAMES.commandRegistered, payload => seen.push(payload));
            bus.On(EVENT_NAMES.commandUnregistered, payload => seen.push(payload));
            const local = new CommandRegistry({ eventBus: bus });

            local.Register(Group('config', 'show', 'reset').build());
            local.Unregister('config');

            expect(seen).toEqual([
                { name: 'config', kind: 'group', scopes: ['global'], paths: ['config show', 'config reset'] },
                { name: 'config', kind: 'group', scope: 'global' },
            ]);
        });
    });
});
