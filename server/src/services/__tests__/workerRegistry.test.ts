/**
 * Tests for background worker startup and shutdown registration
 */

import { ShutdownCoordinator } from '../../utils/shutdownCoordinator.js';
import { scheduledWorker, startAllWorkers } from '../workerRegistry.js';

function fakeWorker() {
    return { start: vi.fn(), stop: vi.fn() };
}

describe('startAllWorkers', () => {
    it('starts every worker and stops it on shutdown', async () => {
        const reconciler = fakeWorker();
        const exporter = fakeWorker();
        const coordinator = new ShutdownCoordinator();

        const started = startAllWorkers(
            [scheduledWorker('reconciler', reconciler), scheduledWorker('exporter', exporter)],
            coordinator,
            { disabled: false }
        );

        expect(started).toEqual(['reconciler', 'exporter']);
        expect(reconciler.start).toHaveBeenCalledTimes(1);
        expect(exporter.start).toHaveBeenCalledTimes(1);

        const results = await coordinator.shutdown();

        expect(results.map(r => [r.name, r.success])).toEqual([
            ['reconciler', true],
            ['exporter', true],
        ]);
        expect(reconciler.stop).toHaveBeenCalledTimes(1);
        expect(exporter.stop).toHaveBeenCalledTimes(1);
    });

    it('starts nothing when disabled', () => {
        const worker = fakeWorker();
        const register = vi.fn();

        expect(startAllWorkers([scheduledWorker('reconciler', worker)], { register }, { disabled: true })).toEqual([]);
        expect(worker.start).not.toHaveBeenCalled();
        expect(register).not.toHaveBeenCalled();
    });
});
