import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as Publish from '../../src/publish';
import { T0, createFakeChannel, createFakePublisher, pendingState } from './fakes';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        debug: vi.fn(),
        verbose: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Poller Supervisor', () => {
    let tempDir: string;
    let store: Publish.PollerStore;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'showrunner-supervisor-test-'));
        store = Publish.createStore({ directory: tempDir });
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    const supervisorWith = (overrides: Partial<Publish.SupervisorConfig> = {}) => {
        const fakeChannel = createFakeChannel();
        const fakePublisher = createFakePublisher();
        const supervisor = Publish.createSupervisor({
            store,
            channel: fakeChannel.channel,
            publisher: fakePublisher.publisher,
            interval: 60,
            emoji: 'outbox_tray',
            command: 'publish',
            timeoutHours: 24,
            clock: () => T0,
            ...overrides,
        });
        return { supervisor, ...fakeChannel, ...fakePublisher };
    };

    it('should persist a new state and run its poller to completion', async () => {
        const { supervisor, reactions, publish } = supervisorWith();
        reactions.add('outbox_tray');

        await supervisor.start(pendingState());
        const results = await supervisor.waitForAll();

        expect(results.get('ep12_20250101_120000')).toBe('published');
        expect(publish).toHaveBeenCalledTimes(1);
        expect(supervisor.active()).toEqual([]);
    });

    it('should resume only pending states', async () => {
        await store.create(pendingState({ bundleId: 'pending-one' }));
        await store.create(pendingState({ bundleId: 'done-one', status: 'triggered' }));
        const { supervisor, reactions } = supervisorWith();
        reactions.add('outbox_tray');

        expect(await supervisor.resume()).toBe(1);
        const results = await supervisor.waitForAll();

        expect([...results.keys()]).toEqual(['pending-one']);
    });

    it('should stop every poller without touching persisted state', async () => {
        let release: () => void = () => undefined;
        const sleep = vi.fn(() => new Promise<void>(resolve => { release = resolve; }));
        const { supervisor } = supervisorWith({ sleep });

        await supervisor.start(pendingState());
        await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
        expect(supervisor.active()).toEqual(['ep12_20250101_120000']);

        supervisor.stopAll();
        release();
        const results = await supervisor.waitForAll();

        expect(results.get('ep12_20250101_120000')).toBe('stopped');
        expect((await store.get('ep12_20250101_120000'))?.status).toBe('pending');
    });
});
