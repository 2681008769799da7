import { Logger } from '@nestjs/common';
import { ClassConstructor } from 'class-transformer';
import {
  describeValidationErrors,
  transformAndValidate,
} from '../../../common/utils/validation.utils';
import { InvalidNodeParametersError } from '../errors/workflow.errors';
import {
  INode,
  NodeMetadata,
  NodeOptions,
  ValidationResult,
} from '../interfaces/node.interfaces';
import { RecordEnvelope } from '../interfaces/record.interfaces';
import { NodeParameters } from '../interfaces/workflow.interfaces';
import { sizeOf } from '../utils/execution.utils';
import { toEnvelope } from '../utils/record.utils';

export abstract class BaseNode<TParams extends object> implements INode {
  protected readonly logger: Logger;
  private readonly defaults: NodeParameters;

  protected constructor(
    private readonly parametersType: ClassConstructor<TParams>,
    options: NodeOptions = {},
  ) {
    this.logger = new Logger(`${this.constructor.name}`);
    this.defaults = options.defaults ?? {};
  }

  abstract getMetadata(): NodeMetadata;

  get type(): string {
    return this.getMetadata().type;
  }

  validate(parameters: NodeParameters): ValidationResult {
    const { errors } = transformAndValidate(this.parametersType, {
      ...this.defaults,
      ...parameters,
    });
    return {
      isValid: errors.length === 0,
      errors: errors.map((error) => `${error.field}: ${error.message}`),
    };
  }

  /**
   * Template method - standard execution flow
   * Subclasses implement process(); input normalisation can be overridden
   */
  async run(input: unknown, parameters: NodeParameters = {}): Promise<RecordEnvelope> {
    const startTime = Date.now();

    // 1. Validate parameters against the node's parameter class
    const params = this.parseParameters(parameters);

    // 2. Normalise input into an envelope
    const envelope = this.prepareInput(input);

    // 3. Main processing
    const output = await this.process(envelope, params);

    this.logger.debug(
      `${this.type} processed ${sizeOf(envelope)} -> ${sizeOf(output)} records in ${
        Date.now() - startTime
      }ms`,
    );

    return output;
  }

  protected prepareInput(input: unknown): RecordEnvelope {
    return toEnvelope(input, this.type);
  }

  /**
   * Main processing logic. Must return new objects and leave the
   * envelope untouched.
   */
  protected abstract process(
    envelope: RecordEnvelope,
    params: TParams,
  ): RecordEnvelope | Promise<RecordEnvelope>;

  private parseParameters(parameters: NodeParameters): TParams {
    const { value, errors } = transformAndValidate(this.parametersType, {
      ...this.defaults,
      ...parameters,
    });

    if (errors.length > 0) {
      this.logger.warn(`Rejected parameters: ${describeValidationErrors(errors)}`);
      throw new InvalidNodeParametersError(
        this.type,
        errors.map((error) => `${error.field}: ${error.message}`),
      );
    }

    return value;
  }
}
