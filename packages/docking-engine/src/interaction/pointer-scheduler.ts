/**
 * Pointer Scheduler
 *
 * Coalesces pointer samples so the docking query runs about once per frame
 * (16ms target). Only the latest sample is kept.
 *
 * Frame timestamps and the clock read by `flush` come from the same frame
 * source: `requestAnimationFrame` stamps frames on the `performance.now()`
 * timeline, and the timeout fallback stamps them from `performance.now()` too.
 */

import type { TangramStore } from '../store';
import type { Point2D } from '../types';

export interface FrameScheduler<T> {
    schedule: (payload: T) => void;
    flush: () => void;
    dispose: () => void;
}

export interface FrameSchedulerOptions {
    minFrameMs?: number;
}

/** Cancels the frame request it was returned for. */
type CancelFrame = () => void;

interface FrameSource {
    now: () => number;
    request: (onFrame: (timestamp: number) => void) => CancelFrame;
}

function hasAnimationFrame(): boolean {
    return typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function';
}

const animationFrameSource: FrameSource = {
    now: () => performance.now(),
    request: (onFrame) => {
        const id = window.requestAnimationFrame(onFrame);
        return () => window.cancelAnimationFrame(id);
    },
};

function timeoutFrameSource(delayMs: number): FrameSource {
    return {
        now: () => performance.now(),
        request: (onFrame) => {
            const id = setTimeout(() => onFrame(performance.now()), delayMs);
            return () => clearTimeout(id);
        },
    };
}

export function createFrameScheduler<T>(
    apply: (payload: T) => void,
    options: FrameSchedulerOptions = {}
): FrameScheduler<T> {
    const minFrameMs = Math.max(options.minFrameMs ?? 16, 0);
    const frames = hasAnimationFrame() ? animationFrameSource : timeoutFrameSource(minFrameMs);
    let latest: { payload: T } | null = null;
    let cancelFrame: CancelFrame | null = null;
    let lastAppliedAt = Number.NEGATIVE_INFINITY;

    const deliver = (timestamp: number) => {
        if (latest === null) return;
        const { payload } = latest;
        latest = null;
        lastAppliedAt = timestamp;
        apply(payload);
    };

    const requestFrame = () => {
        cancelFrame = frames.request(onFrame);
    };

    function onFrame(timestamp: number): void {
        cancelFrame = null;
        if (latest === null) return;
        if (timestamp - lastAppliedAt < minFrameMs) {
            requestFrame();
            return;
        }
        // A sample scheduled from inside `apply` requests its own frame.
        deliver(timestamp);
    }

    const cancel = () => {
        if (cancelFrame === null) return;
        cancelFrame();
        cancelFrame = null;
    };

    return {
        schedule: (payload) => {
            latest = { payload };
            if (cancelFrame === null) requestFrame();
        },
        flush: () => {
            if (latest === null) return;
            cancel();
            deliver(frames.now());
        },
        dispose: () => {
            latest = null;
            cancel();
        },
    };
}

/** Routes pointer samples to the store's `pointerMove`, at most once per frame. */
export function bindPointerScheduler(
    store: TangramStore,
    options: FrameSchedulerOptions = {}
): FrameScheduler<Point2D> {
    return createFrameScheduler((point: Point2D) => store.getState().pointerMove(point), options);
}
