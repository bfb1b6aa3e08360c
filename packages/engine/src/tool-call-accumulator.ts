import { ProtocolError } from '@tessera/shared';
import type { ToolCallRequest } from '@tessera/shared';

interface PartialCall {
  id: string;
  name: string;
  fragments: string[];
  complete: boolean;
}

/**
 * Collects streamed tool-call fragments keyed by call id. Fragments are only
 * concatenated; nothing is parsed until the call is complete, which happens
 * at its `end` or when the message finishes, whichever comes first.
 */
export class ToolCallAccumulator {
  private calls = new Map<string, PartialCall>();

  get size(): number {
    return this.calls.size;
  }

  start(id: string, name: string): void {
    const existing = this.calls.get(id);
    if (existing) {
      if (existing.complete) throw new ProtocolError(`tool call '${id}' restarted after it completed`);
      if (!existing.name) existing.name = name;
      return;
    }
    this.calls.set(id, { id, name, fragments: [], complete: false });
  }

  append(id: string, fragment: string): void {
    const call = this.calls.get(id);
    if (!call) throw new ProtocolError(`argument fragment for unknown tool call '${id}'`);
    if (call.complete) throw new ProtocolError(`argument fragment for completed tool call '${id}'`);
    call.fragments.push(fragment);
  }

  end(id: string): void {
    const call = this.calls.get(id);
    if (!call) throw new ProtocolError(`end of unknown tool call '${id}'`);
    call.complete = true;
  }

  isComplete(id: string): boolean {
    return this.calls.get(id)?.complete ?? false;
  }

  /** Completes every call and returns them in the order they started. */
  finish(): ToolCallRequest[] {
    return [...this.calls.values()].map((call) => {
      call.complete = true;
      if (!call.name) throw new ProtocolError(`tool call '${call.id}' has no name`);
      return { id: call.id, name: call.name, arguments: call.fragments.join('') };
    });
  }
}
