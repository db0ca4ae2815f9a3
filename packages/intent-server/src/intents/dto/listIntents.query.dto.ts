import { IsIn, IsOptional } from 'class-validator';
import { INTENT_STATES, type IntentState } from '../intent.types';

export class ListIntentsQueryDto {
  @IsOptional()
  @IsIn(INTENT_STATES)
  state?: IntentState;
}
