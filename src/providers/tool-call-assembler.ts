/**
 * ToolCallAssembler — accumulates fragmented tool-call data keyed by the
 * backend-assigned index until the stream ends, then parses each call's
 * argument text into a structured request.
 */
import { nanoid } from 'nanoid';

import type { ToolCallRequest } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import type { RawToolCallPiece, StreamEvent } from './types.js';

const logger = createLogger({ name: 'tool-call-assembler' });

/** Decoder-internal state for one tool call. Discarded once finalized. */
interface ToolCallFragment {
  index: number;
  callId?: string;
  name: string;
  argumentsText: string;
}

/**
 * Parse a tool call's argument text.
 * Never throws: anything that is not a JSON object is passed through
 * as `{ raw_arguments: text }` so the tool can reject it itself.
 */
export function parseToolArguments(text: string): Record<string, unknown> {
  if (text.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    logger.warn('Tool call arguments are not valid JSON', {
      component: 'tool-call-assembler',
      length: text.length,
    });
    return { raw_arguments: text };
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { raw_arguments: text };
  }
  return { ...parsed };
}

/** Freeze a finalized request so nothing downstream can alter it. */
export function createToolCallRequest(
  callId: string,
  name: string,
  argumentsText: string,
): ToolCallRequest {
  return Object.freeze({
    callId,
    name,
    arguments: Object.freeze(parseToolArguments(argumentsText)),
  });
}

export interface ToolCallAssembler {
  /** Route one piece to its slot; returns the events it causes, in order. */
  accept(piece: RawToolCallPiece): StreamEvent[];

  /** Finalize every open slot in ascending index order. */
  finish(): StreamEvent[];
}

/** Create an assembler for one decoding pass. */
export function createToolCallAssembler(): ToolCallAssembler {
  const slots = new Map<number, ToolCallFragment>();

  function callIdOf(slot: ToolCallFragment): string {
    // Some backends never send an id; give the call a stable one.
    slot.callId ??= `call_${nanoid(12)}`;
    return slot.callId;
  }

  return {
    accept(piece: RawToolCallPiece): StreamEvent[] {
      const events: StreamEvent[] = [];

      let slot = slots.get(piece.index);
      if (!slot) {
        slot = { index: piece.index, name: '', argumentsText: '' };
        slots.set(piece.index, slot);
      }

      // Once an id has gone out in an event it stays with the call.
      if (piece.id) {
        slot.callId ??= piece.id;
      }

      // The first non-empty name wins; later ones are ignored.
      if (piece.name && slot.name === '') {
        slot.name = piece.name;
        events.push({ type: 'tool_call_started', callId: callIdOf(slot), name: slot.name });
      }

      if (piece.argumentsDelta) {
        slot.argumentsText += piece.argumentsDelta;
        events.push({
          type: 'tool_call_arguments_delta',
          callId: callIdOf(slot),
          name: slot.name,
          delta: piece.argumentsDelta,
        });
      }

      return events;
    },

    finish(): StreamEvent[] {
      const ordered = [...slots.values()].sort((a, b) => a.index - b.index);
      slots.clear();

      return ordered.map((slot) => ({
        type: 'tool_call_finished' as const,
        request: createToolCallRequest(callIdOf(slot), slot.name, slot.argumentsText),
      }));
    },
  };
}
