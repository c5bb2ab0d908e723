export type StreamType = 'state_change' | 'event' | 'action' | 'tool_result' | 'artifact' | 'error';
export type StreamProducer = 'system' | 'model';

export type StreamEnvelope = {
  run_id: string;
  sequence: number;
  timestamp: string;
  type: StreamType;
  phase: string;
  producer: StreamProducer;
  payload: Record<string, unknown>;
};

export type EmitFn = (envelope: StreamEnvelope) => Promise<void> | void;
type SequenceRef = { value: number };

/**
 * Emits ordered progress envelopes for one run. Streamers created with `forPhase` share the parent's
 * sequence counter, so envelopes from every phase of a run are totally ordered.
 */
export class RunStreamer {
  private readonly sequenceRef: SequenceRef;

  constructor(
    readonly runId: string,
    private readonly phase: string,
    private readonly emitFn: EmitFn,
    sequenceRef?: SequenceRef
  ) {
    this.sequenceRef = sequenceRef ?? { value: 0 };
  }

  forPhase(phase: string): RunStreamer {
    return new RunStreamer(this.runId, phase, this.emitFn, this.sequenceRef);
  }

  private async emit(type: StreamType, producer: StreamProducer, payload: Record<string, unknown>): Promise<StreamEnvelope> {
    this.sequenceRef.value += 1;
    const envelope: StreamEnvelope = {
      run_id: this.runId,
      sequence: this.sequenceRef.value,
      timestamp: new Date().toISOString(),
      type,
      phase: this.phase,
      producer,
      payload
    };
    await this.emitFn(envelope);
    return envelope;
  }

  emitEvent(payload: Record<string, unknown>): Promise<StreamEnvelope> {
    return this.emit('event', 'system', payload);
  }

  emitAction(payload: Record<string, unknown>, producer: StreamProducer = 'model'): Promise<StreamEnvelope> {
    return this.emit('action', producer, payload);
  }

  emitToolResult(payload: Record<string, unknown>): Promise<StreamEnvelope> {
    return this.emit('tool_result', 'system', payload);
  }

  emitArtifact(payload: Record<string, unknown>, producer: StreamProducer = 'system'): Promise<StreamEnvelope> {
    return this.emit('artifact', producer, payload);
  }

  emitStateChange(payload: Record<string, unknown>): Promise<StreamEnvelope> {
    return this.emit('state_change', 'system', payload);
  }

  emitError(payload: Record<string, unknown>): Promise<StreamEnvelope> {
    return this.emit('error', 'system', payload);
  }
}

export const discardEnvelopes: EmitFn = () => {};
