import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Post,
} from '@nestjs/common';
import { parseBody } from '../common/validation';
import { CreateConversationSchema, SendMessageSchema } from './chat.schemas';
import { ChatService, greetingFor } from './chat.service';

@Controller('conversations')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  create(@Body() body: unknown) {
    const { customerName, ticketId } = parseBody(CreateConversationSchema, body);
    const conversation = this.chat.createConversation(customerName, ticketId);
    return { ...conversation, greeting: greetingFor(conversation) };
  }

  @Get()
  list() {
    return this.chat.listConversations();
  }

  @Post(':id/messages')
  @HttpCode(200)
  async send(@Param('id') id: string, @Body() body: unknown) {
    const { message, timeoutMs } = parseBody(SendMessageSchema, body);
    return this.chat.handleMessage(id, message, { timeoutMs });
  }

  @Get(':id/messages')
  history(@Param('id') id: string) {
    const { customerName, ticketId, createdAt, messages } =
      this.chat.getConversation(id);
    return { conversationId: id, customerName, ticketId, createdAt, messages };
  }

  @Delete(':id/messages')
  @HttpCode(204)
  async clear(@Param('id') id: string) {
    await this.chat.clearConversation(id);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@Param('id') id: string) {
    await this.chat.deleteConversation(id);
  }
}
