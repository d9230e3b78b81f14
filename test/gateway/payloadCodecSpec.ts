import { encodeEnvelope, parseEnvelope, PayloadCodec } from '../../src/gateway/payload-codec';
import { MemoryTracer, Trace } from '../../src/util/trace';
import { createCompressor } from './test-helpers';

describe('PayloadCodec', () => {
  let tracer: MemoryTracer;
  let codec: PayloadCodec;

  beforeEach(() => {
    tracer = new MemoryTracer();
    Trace.configure(tracer);
    codec = new PayloadCodec();
  });

  afterEach(() => {
    Trace.off();
  });

  describe('encode', () => {
    it('should omit data when none is given', () => {
      expect(codec.encode(1)).toBe('{"op":1}');
    });

    it('should keep null data', () => {
      expect(codec.encode(1, null)).toBe('{"op":1,"d":null}');
    });

    it('should serialize the payload under d', () => {
      expect(encodeEnvelope(6, { token: 'test-token', session_id: 'abc', seq: 12 }))
        .toBe('{"op":6,"d":{"token":"test-token","session_id":"abc","seq":12}}');
    });
  });

  describe('text frames', () => {
    it('should decode a dispatch', () => {
      const envelope = codec.decode('{"op":0,"s":7,"t":"MESSAGE_CREATE","d":{"content":"hi"}}');

      expect(envelope).toEqual({ op: 0, s: 7, t: 'MESSAGE_CREATE', d: { content: 'hi' } });
    });

    it('should leave out null sequence and event name', () => {
      const envelope = codec.decode('{"op":10,"s":null,"t":null,"d":{"heartbeat_interval":41250}}');

      expect(envelope).toEqual({ op: 10, d: { heartbeat_interval: 41250 } });
      expect(envelope).not.toHaveProperty('s');
      expect(envelope).not.toHaveProperty('t');
    });

    it('should keep a false payload', () => {
      expect(codec.decode('{"op":9,"d":false}')).toEqual({ op: 9, d: false });
    });

    it('should decode an envelope encoded without data to one without d', () => {
      const envelope = codec.decode(codec.encode(11));

      expect(envelope).toEqual({ op: 11 });
      expect(envelope).not.toHaveProperty('d');
    });

    it('should drop invalid JSON', () => {
      expect(codec.decode('{"op":')).toBeNull();

      const warnings = tracer.messages('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].startsWith('Dropping malformed frame: ')).toBe(true);
    });

    it('should drop an envelope without an opcode', () => {
      expect(codec.decode('{"d":{}}')).toBeNull();
      expect(tracer.messages('warn')).toEqual([
        "Dropping malformed frame: Expected an integer 'op' property."
      ]);
    });
  });

  describe('binary frames', () => {
    it('should inflate consecutive messages from one stream', () => {
      const compress = createCompressor();

      const first = codec.decode(compress('{"op":10,"d":{"heartbeat_interval":41250}}'));
      const second = codec.decode(compress('{"op":0,"s":1,"t":"READY","d":{"session_id":"abc"}}'));

      expect(first).toEqual({ op: 10, d: { heartbeat_interval: 41250 } });
      expect(second).toEqual({ op: 0, s: 1, t: 'READY', d: { session_id: 'abc' } });
    });

    it('should buffer a frame until the flush marker arrives', () => {
      const compressed = createCompressor()('{"op":11}');
      const head = compressed.slice(0, 3);
      const tail = compressed.slice(3);

      expect(codec.decode(head)).toBeNull();
      expect(codec.decode(tail)).toEqual({ op: 11 });
      expect(tracer.messages('warn')).toEqual([]);
    });

    it('should drop a frame that is not valid zlib data', () => {
      const garbage = new Uint8Array([0x01, 0x02, 0x03, 0x00, 0x00, 0xff, 0xff]);

      expect(codec.decode(garbage)).toBeNull();

      const warnings = tracer.messages('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].startsWith('Dropping binary frame: zlib error')).toBe(true);
    });

    it('should start a new stream after a reset', () => {
      const firstStream = createCompressor();
      expect(codec.decode(firstStream('{"op":11}'))).toEqual({ op: 11 });

      codec.reset();

      const secondStream = createCompressor();
      expect(codec.decode(secondStream('{"op":1,"d":null}'))).toEqual({ op: 1, d: null });
    });
  });
});

describe('parseEnvelope', () => {
  it('should reject a value that is not an object', () => {
    expect(() => parseEnvelope([1])).toThrow('Expected the envelope to be an object.');
  });

  it('should reject a fractional sequence', () => {
    expect(() => parseEnvelope({ op: 0, s: 1.5 })).toThrow("Expected 's' to be an integer.");
  });

  it('should reject a numeric event name', () => {
    expect(() => parseEnvelope({ op: 0, t: 42 })).toThrow("Expected 't' to be a string.");
  });
});
