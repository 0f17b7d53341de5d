import { describe, it, expect, beforeEach } from 'vitest';
import { ChannelPool } from '@/game/audio/channel-pool';
import type { PlaybackInstance } from '@/game/audio/audio-definitions';

function instance(soundName: string, channelId: number, startTime: number): PlaybackInstance {
    return { soundName, channelId, startTime, requestVolume: 1 };
}

describe('ChannelPool', () => {
    let busy: Set<number>;
    let pool: ChannelPool;

    beforeEach(() => {
        busy = new Set();
        pool = new ChannelPool(3, (channel) => busy.has(channel));
    });

    describe('acquire', () => {
        it('should return the first unbound idle channel', () => {
            pool.bind(instance('a', 0, 0));
            busy.add(0);

            expect(pool.acquire()).toEqual({ channelId: 1, evicted: null });
        });

        it('should skip unbound channels that are still busy', () => {
            busy.add(0);
            expect(pool.acquire()).toEqual({ channelId: 1, evicted: null });
        });

        it('should evict the oldest instance when every channel is taken', () => {
            const first = instance('a', 0, 30);
            const second = instance('b', 1, 10);
            const third = instance('c', 2, 20);
            for (const i of [first, second, third]) {
                pool.bind(i);
                busy.add(i.channelId);
            }

            expect(pool.acquire()).toEqual({ channelId: 1, evicted: second });
            expect(pool.active).toEqual([first, third]);
            expect(pool.get(1)).toBeUndefined();
        });

        it('should break start time ties by bind order', () => {
            const b = instance('b', 2, 5);
            const a = instance('a', 0, 5);
            pool.bind(b);
            pool.bind(a);
            pool.bind(instance('c', 1, 5));
            busy.add(0).add(1).add(2);

            expect(pool.acquire()?.evicted).toBe(b);
        });

        it('should take channel 0 when all channels play untracked sound', () => {
            busy.add(0).add(1).add(2);
            expect(pool.acquire()).toEqual({ channelId: 0, evicted: null });
        });

        it('should return null for an empty pool', () => {
            expect(new ChannelPool(0, () => false).acquire()).toBeNull();
        });
    });

    describe('bind', () => {
        it('should reject a second instance on the same channel', () => {
            pool.bind(instance('a', 1, 0));
            expect(() => pool.bind(instance('b', 1, 0))).toThrow('Channel 1 is already bound');
        });

        it('should reject channels outside the pool', () => {
            expect(() => pool.bind(instance('a', 3, 0))).toThrow('Channel 3 is outside the pool of 3');
        });

        it('should track free channels', () => {
            pool.bind(instance('a', 0, 0));
            expect(pool.freeCount).toBe(2);
            expect(pool.capacity).toBe(3);
        });
    });

    describe('reaping', () => {
        it('should remove instances whose channel is idle', () => {
            pool.bind(instance('a', 0, 0));
            pool.bind(instance('b', 1, 0));
            busy.add(1);

            const removed = pool.reapCompleted();

            expect(removed.map(i => i.soundName)).toEqual(['a']);
            expect(pool.active.map(i => i.soundName)).toEqual(['b']);
        });

        it('should remove instances at or past the maximum age', () => {
            pool.bind(instance('a', 0, 0));
            pool.bind(instance('b', 1, 500));
            busy.add(0).add(1);

            expect(pool.reapStale(1000, 1000).map(i => i.soundName)).toEqual(['a']);
            expect(pool.instancesOf('b')).toHaveLength(1);
            expect(pool.acquire()).toEqual({ channelId: 2, evicted: null });
        });

        it('should release and clear', () => {
            pool.bind(instance('a', 0, 0));
            pool.bind(instance('a', 1, 0));

            expect(pool.release(0)?.channelId).toBe(0);
            expect(pool.release(0)).toBeNull();
            expect(pool.clear()).toHaveLength(1);
            expect(pool.active).toHaveLength(0);
        });
    });
});
