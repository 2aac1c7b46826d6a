import { RESULT_OK, describeStatus, type PineAnswer } from '@pinebridge/core';
import { renderAnswer } from '@pinebridge/server';
import { formatJson } from './resolve-session.ts';

export function describeAnswer(answer: PineAnswer): string {
  switch (answer.kind) {
    case 'read8':
    case 'read16':
    case 'read32':
    case 'read64':
      return answer.memoryValue === undefined
        ? '(no value)'
        : `0x${answer.memoryValue.toString(16)} (${answer.memoryValue.toString()})`;
    case 'version':
      return answer.version;
    case 'title':
      return answer.title;
    case 'id':
      return answer.id;
    case 'uuid':
      return answer.uuid;
    case 'gameVersion':
      return answer.gameVersion;
    case 'status':
      return describeStatus(answer.status);
    default:
      return 'ok';
  }
}

/** Prints the answer and marks the process failed when the emulator did. */
export function reportAnswer(answer: PineAnswer, json: boolean): void {
  if (json) {
    console.log(formatJson(renderAnswer(answer)));
  } else if (answer.resultCode === RESULT_OK) {
    console.log(describeAnswer(answer));
  }
  if (answer.resultCode !== RESULT_OK) {
    console.error(`${answer.kind} failed with result code ${answer.resultCode}`);
    process.exitCode = 1;
  }
}
