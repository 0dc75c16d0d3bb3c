import { TimerQueueCore } from '../src/core/timerqueue.js';
import { handlerOf } from '../src/core/record.js';

function hrMs([s, ns]: [number, number]) { return s * 1000 + ns / 1e6; }

const N = parseInt(process.env.BENCH_N || '200000', 10);
const IDENTITIES = 1000;
const q = new TimerQueueCore<number, number>();
let fired = 0;
let cancelled = 0;
const h = handlerOf(() => { fired++; }, () => { cancelled++; });

const start = process.hrtime();
for (let i = 0; i < N; i++) q.enqueue(Math.random() * N, h, i % IDENTITIES);
let t = hrMs(process.hrtime(start));
console.log(`ENQUEUE ${N} timers in ${t.toFixed(2)} ms -> ${(N / (t/1000)).toFixed(0)} ops/sec`);

const start2 = process.hrtime();
for (let id = 0; id < IDENTITIES; id += 2) q.cancel(id);
t = hrMs(process.hrtime(start2));
console.log(`CANCEL ${cancelled} timers in ${t.toFixed(2)} ms -> ${(cancelled / (t/1000)).toFixed(0)} ops/sec`);

const start3 = process.hrtime();
q.dispatchDue(N + 1);
t = hrMs(process.hrtime(start3));
console.log(`DISPATCH ${fired} timers in ${t.toFixed(2)} ms -> ${(fired / (t/1000)).toFixed(0)} ops/sec (pending=${q.size()})`);
