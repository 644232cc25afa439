import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { MessageRow } from '../types.js';
import type { ServiceContext } from './context.js';

export const MAX_MESSAGE_LENGTH = 400;

export function createMessageService({ repository, now }: ServiceContext) {
  async function sendMessage(teamId: string, text: string, isResponse: boolean): Promise<MessageRow> {
    const body = text.trim();
    if (!body) {
      throw new ValidationError('Message must not be blank', { field: 'text' });
    }
    if (body.length > MAX_MESSAGE_LENGTH) {
      throw new ValidationError(`Message must be at most ${MAX_MESSAGE_LENGTH} characters`, { field: 'text' });
    }
    if (!(await repository.getTeam(teamId))) {
      throw new NotFoundError('Team not found');
    }

    return repository.insertMessage({
      team_id: teamId,
      is_response: isResponse,
      text: body,
      sent_at: now().toISOString(),
    });
  }

  async function listMessages(teamId: string) {
    return repository.listMessages(teamId);
  }

  return { sendMessage, listMessages };
}

export type MessageService = ReturnType<typeof createMessageService>;
