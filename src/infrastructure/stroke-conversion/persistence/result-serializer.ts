import type { ConversionResult, DrawingCommand } from '@domain/stroke-conversion/index.js';

export interface SerializedCommand {
  start_norm: [number, number];
  end_norm: [number, number];
  color: string;
  thickness: number;
}

export interface SerializedConversionResult {
  frames: SerializedCommand[][];
  metadata: {
    width: number;
    height: number;
    original_fps: number;
    frame_count: number;
    total_commands_generated: number;
    processing_options: {
      brush_thickness: number;
      quality_factor: number;
      transparency_threshold: number;
      max_frames_processed: number | null;
    };
  };
}

export function serializeCommand(command: DrawingCommand): SerializedCommand {
  return {
    start_norm: [command.start[0], command.start[1]],
    end_norm: [command.end[0], command.end[1]],
    color: command.color,
    thickness: command.thickness,
  };
}

/** Maps a result onto the snake_case document playback clients read. */
export function serializeResult(result: ConversionResult): SerializedConversionResult {
  const { metadata } = result;

  return {
    frames: result.frames.map((frame) => frame.map(serializeCommand)),
    metadata: {
      width: metadata.width,
      height: metadata.height,
      original_fps: metadata.originalFps,
      frame_count: metadata.frameCount,
      total_commands_generated: metadata.totalCommands,
      processing_options: {
        brush_thickness: metadata.processingOptions.brushThickness,
        quality_factor: metadata.processingOptions.samplingStride,
        transparency_threshold: metadata.processingOptions.transparencyThreshold,
        max_frames_processed: metadata.processingOptions.maxFrames,
      },
    },
  };
}
