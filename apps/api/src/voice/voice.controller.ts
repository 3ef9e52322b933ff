import { Body, Controller, Header, HttpCode, Inject, Logger, Post } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { ConfigService } from '../config/config.service.js';
import { VoiceAssistantService } from './voice-assistant.service.js';
import { REPROMPT, greetAndGather, sayAndGather } from './twiml.js';

// Subset of the form fields the telephony provider posts to its webhooks
export interface VoiceWebhookBody {
  CallSid?: string;
  SpeechResult?: string;
  CallStatus?: string;
}

const FINAL_CALL_STATUSES = new Set(['completed', 'busy', 'failed', 'no-answer', 'canceled']);

@ApiExcludeController()
@Controller('voice')
export class VoiceController {
  private readonly logger = new Logger(VoiceController.name);

  constructor(
    @Inject(VoiceAssistantService) private readonly assistant: VoiceAssistantService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  @Post()
  @HttpCode(200)
  @Header('Content-Type', 'text/xml')
  answer(@Body() body: VoiceWebhookBody): string {
    this.logger.log(`Incoming call ${body.CallSid ?? '(unknown)'}`);
    return greetAndGather(this.config.gatherTimeoutSeconds);
  }

  @Post('process-speech')
  @HttpCode(200)
  @Header('Content-Type', 'text/xml')
  async processSpeech(@Body() body: VoiceWebhookBody): Promise<string> {
    const callId = body.CallSid?.trim();
    const speech = body.SpeechResult?.trim();
    const timeout = this.config.gatherTimeoutSeconds;

    if (!callId || !speech) {
      return sayAndGather(REPROMPT, timeout);
    }

    const turn = await this.assistant.handleTurn(callId, speech);
    return sayAndGather(turn.reply, timeout);
  }

  @Post('status')
  @HttpCode(204)
  status(@Body() body: VoiceWebhookBody): void {
    const callId = body.CallSid;
    if (callId && body.CallStatus && FINAL_CALL_STATUSES.has(body.CallStatus)) {
      this.logger.log(`Call ${callId} ended with status ${body.CallStatus}`);
      this.assistant.endCall(callId);
    }
  }
}
