import { RmqContext } from '@nestjs/microservices';
import { Channel, Message } from 'amqplib';

export interface RmqHandles {
  channel: Channel;
  message: Message;
}

export function rmqHandles(context: RmqContext): RmqHandles {
  return {
    channel: context.getChannelRef() as Channel,
    message: context.getMessage() as Message,
  };
}
