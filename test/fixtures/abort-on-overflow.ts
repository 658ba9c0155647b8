import { ByteBuffer } from '../../src/index.js';

const buffer = new ByteBuffer({ limits: { maxBufferUnits: 16 }, allocationFailure: 'abort' });
buffer.append(new Uint8Array(40).fill(0x61));
process.stdout.write('still running\n');
