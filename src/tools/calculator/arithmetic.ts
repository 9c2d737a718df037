import { z } from 'zod';
import type { ArithmeticOperation, CalculationResult } from '../../types/tools.js';
import { DomainError } from '../../utils/error-handler.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const OperandsSchema = z.object({
  a: z.number().describe('First number'),
  b: z.number().describe('Second number')
});

type Operands = z.infer<typeof OperandsSchema>;

/**
 * Results must survive JSON: overflow to Infinity is refused, and -0 becomes 0
 * since it would not come back from the wire as -0.
 */
function calculation(operation: ArithmeticOperation, { a, b }: Operands, result: number): CalculationResult {
  if (!Number.isFinite(result)) {
    throw new DomainError('Result is not a finite number');
  }

  return {
    operation,
    operands: [a, b],
    result: result === 0 ? 0 : result,
    timestamp: new Date().toISOString()
  };
}

export const addTool = wrapTool({
  name: 'calculator.add',
  description: 'Add two numbers',
  schema: OperandsSchema,
  handler: (operands) => calculation('addition', operands, operands.a + operands.b)
});

export const subtractTool = wrapTool({
  name: 'calculator.subtract',
  description: 'Subtract two numbers',
  schema: OperandsSchema,
  handler: (operands) => calculation('subtraction', operands, operands.a - operands.b)
});

export const multiplyTool = wrapTool({
  name: 'calculator.multiply',
  description: 'Multiply two numbers',
  schema: OperandsSchema,
  handler: (operands) => calculation('multiplication', operands, operands.a * operands.b)
});

export const divideTool = wrapTool({
  name: 'calculator.divide',
  description: 'Divide two numbers',
  schema: OperandsSchema,
  handler: (operands) => {
    if (operands.b === 0) {
      throw new DomainError('Cannot divide by zero');
    }

    return calculation('division', operands, operands.a / operands.b);
  }
});
