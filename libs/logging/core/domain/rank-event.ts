import {
  IsString,
  IsNotEmpty,
  IsInt,
  IsEnum,
  IsNumber,
  Min,
} from 'class-validator';
import { LatencyBucket, RankOutcome } from '../value-objects';

/**
 * What the engine reports when a ranking request stops, either because it
 * emitted its terminal snapshot or because a newer request took over.
 */
export interface RankSummary {
  requestId: number;
  outcome: RankOutcome;
  candidates: number;
  eligible: number;
  scored: number;
  failed: number;
  durationMs: number;
}

/**
 * RankEvent - one wide event per ranking request.
 *
 * A class rather than an interface so it can be checked with class-validator
 * before it reaches the LoggerPort.
 */
export class RankEvent {
  @IsInt()
  @Min(1)
  public requestId!: number;

  @IsString()
  @IsNotEmpty()
  public timestamp!: string;

  @IsString()
  @IsNotEmpty()
  public service!: string;

  @IsEnum(RankOutcome)
  public outcome!: RankOutcome;

  @IsInt()
  @Min(0)
  public candidates!: number;

  @IsInt()
  @Min(0)
  public eligible!: number;

  @IsInt()
  @Min(0)
  public scored!: number;

  @IsInt()
  @Min(0)
  public failed!: number;

  @IsNumber()
  @Min(0)
  public durationMs!: number;

  @IsEnum(LatencyBucket)
  public latencyBucket!: LatencyBucket;

  constructor(partial: Partial<RankEvent>) {
    Object.assign(this, partial);
  }
}
