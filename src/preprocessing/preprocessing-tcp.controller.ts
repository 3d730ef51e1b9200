import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { plainToInstance } from 'class-transformer';
import { validate, type ValidationError } from 'class-validator';
import { PreprocessRequestDto } from './dto';
import { PreprocessError } from './errors';
import { PreprocessEngine } from './preprocess.engine';
import type { PreprocessOutput, PreprocessStageName } from './types';

export type PreprocessDocumentResponse =
  | { success: true; output: PreprocessOutput }
  | {
      success: false;
      error: {
        name: string;
        stage: PreprocessStageName | null;
        message: string;
      };
    };

function describeValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${path}: ${constraint}`,
    );
    return [...own, ...describeValidationErrors(error.children ?? [], path)];
  });
}

@Controller()
export class PreprocessingTcpController {
  private readonly logger = new Logger(PreprocessingTcpController.name);

  constructor(private readonly engine: PreprocessEngine) {}

  @MessagePattern('preprocess_document')
  async preprocessDocument(
    @Payload() data: unknown,
  ): Promise<PreprocessDocumentResponse> {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      return {
        success: false,
        error: {
          name: 'ValidationError',
          stage: 'input',
          message: 'Payload must be an object with a pages array',
        },
      };
    }

    const request = plainToInstance(PreprocessRequestDto, data);
    const validationErrors = await validate(request, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (validationErrors.length > 0) {
      const message = describeValidationErrors(validationErrors).join('; ');
      this.logger.warn(`Rejected preprocess_document payload: ${message}`);

      return {
        success: false,
        error: { name: 'ValidationError', stage: 'input', message },
      };
    }

    try {
      this.logger.log(
        `Received request to preprocess document with ${request.pages.length} pages`,
      );

      const output = this.engine.execute(request.pages, request.options ?? {});

      return {
        success: true,
        output,
      };
    } catch (error) {
      this.logger.error(
        'Error preprocessing document',
        error instanceof Error ? error.stack : String(error),
      );

      if (error instanceof PreprocessError) {
        return {
          success: false,
          error: {
            name: error.name,
            stage: error.stage,
            message: error.message,
          },
        };
      }

      return {
        success: false,
        error: {
          name: error instanceof Error ? error.name : 'Error',
          stage: null,
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }
}
