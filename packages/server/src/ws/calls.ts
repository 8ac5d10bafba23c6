// @module: server-ws-calls
// @tags: websocket, calls, signaling

import {
  createOutboundEvent,
  type CallAnsweredData,
  type CallDeclinedData,
  type CallEndedData,
  type CallInitiatedData,
  type CallParticipantChangeData,
} from '@chatwire/schemas';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { reply, type ConnectionContext } from './context.js';
import type { EventDispatcher } from './dispatcher.js';
import type { SessionRegistry } from './sessionRegistry.js';

export interface CallSignaling {
  initiated(context: ConnectionContext, data: CallInitiatedData): Promise<void>;
  answered(context: ConnectionContext, data: CallAnsweredData): void;
  declined(context: ConnectionContext, data: CallDeclinedData): void;
  ended(context: ConnectionContext, data: CallEndedData): void;
  participantChanged(
    context: ConnectionContext,
    type: 'call_participant_joined' | 'call_participant_left',
    data: CallParticipantChangeData,
  ): void;
}

/** Relays call signaling between peers. Media never passes through here. */
export const createCallSignaling = ({
  dispatcher,
  registry,
  notifications,
}: {
  dispatcher: EventDispatcher;
  registry: SessionRegistry;
  notifications: NotificationDispatcher;
}): CallSignaling => {
  const initiated = async (context: ConnectionContext, data: CallInitiatedData): Promise<void> => {
    const callerId = context.user.id;
    dispatcher.publish('incoming_call', () =>
      dispatcher.sendToUser(
        data.callee_id,
        createOutboundEvent('incoming_call', {
          call_id: data.call_id,
          caller_id: callerId,
          call_type: data.call_type,
          channel_name: data.channel_name,
        }),
      ),
    );

    await reply(
      dispatcher,
      context,
      createOutboundEvent('call_initiated_success', {
        call_id: data.call_id,
        channel_name: data.channel_name,
      }),
    );

    if (!registry.isOnline(data.callee_id)) {
      dispatcher.publish('incoming_call_push', () =>
        notifications.notify(data.callee_id, {
          category: 'incoming_call',
          title: data.call_type === 'audio' ? 'Incoming voice call' : 'Incoming video call',
          body: `${context.user.username ?? 'Someone'} is calling you`,
          data: {
            call_id: String(data.call_id),
            caller_id: callerId,
            call_type: data.call_type,
            channel_name: data.channel_name,
          },
        }),
      );
    }
  };

  const answered = (context: ConnectionContext, data: CallAnsweredData): void => {
    const calleeId = context.user.id;
    const event = data.accepted
      ? createOutboundEvent('call_answered', {
          call_id: data.call_id,
          callee_id: calleeId,
          channel_name: data.channel_name,
        })
      : createOutboundEvent('call_declined', { call_id: data.call_id, callee_id: calleeId });

    dispatcher.publish(event.type, () => dispatcher.sendToUser(data.caller_id, event));
  };

  const declined = (context: ConnectionContext, data: CallDeclinedData): void => {
    dispatcher.publish('call_declined', () =>
      dispatcher.sendToUser(
        data.caller_id,
        createOutboundEvent('call_declined', { call_id: data.call_id, callee_id: context.user.id }),
      ),
    );
  };

  const ended = (context: ConnectionContext, data: CallEndedData): void => {
    dispatcher.publish('call_ended', () =>
      dispatcher.sendToUsers(
        data.participants,
        createOutboundEvent('call_ended', {
          call_id: data.call_id,
          ended_by: context.user.id,
          end_reason: data.end_reason,
        }),
        { excludeUserId: context.user.id },
      ),
    );
  };

  const participantChanged = (
    context: ConnectionContext,
    type: 'call_participant_joined' | 'call_participant_left',
    data: CallParticipantChangeData,
  ): void => {
    dispatcher.publish(type, () =>
      dispatcher.sendToUsers(
        data.participants,
        createOutboundEvent(type, {
          call_id: data.call_id,
          participant_id: context.user.id,
          participant_name: data.participant_name,
        }),
        { excludeUserId: context.user.id },
      ),
    );
  };

  return {
    initiated,
    answered,
    declined,
    ended,
    participantChanged,
  };
};
