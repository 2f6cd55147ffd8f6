import { CommandKind, GT06Command, ServerPacket } from './gt06.types';

const STOP_WORDS = ['STOP', 'DESLIGAR', 'BLOQUEAR'];
const RESUME_WORDS = ['START', 'LIGAR', 'DESBLOQUEAR'];

/**
 * Server command payloads are null padded text.
 */
export function commandText(payload: Buffer): string {
  return Buffer.from(payload.filter((byte) => byte !== 0x00))
    .toString('utf8')
    .trim();
}

export function classifyCommand(text: string): CommandKind {
  const upper = text.toUpperCase();

  if (upper.includes('RELAY')) {
    if (upper.includes(',1') || upper.includes('1#')) return CommandKind.ENGINE_STOP;
    if (upper.includes(',0') || upper.includes('0#')) return CommandKind.ENGINE_RESUME;
  }

  // Substring match; stop words win, so DESBLOQUEAR stops the engine
  if (STOP_WORDS.some((word) => upper.includes(word))) return CommandKind.ENGINE_STOP;
  if (RESUME_WORDS.some((word) => upper.includes(word))) return CommandKind.ENGINE_RESUME;

  return CommandKind.UNKNOWN;
}

export function interpretCommand(packet: ServerPacket): GT06Command {
  const rawText = commandText(packet.payload);
  return {
    rawText,
    kind: classifyCommand(rawText),
    serialNumber: packet.serialNumber,
  };
}

/**
 * String handed to the relay controller: the canonical name for a classified
 * command, the server's text otherwise.
 */
export function toRelayCommand(command: GT06Command): string {
  return command.kind === CommandKind.UNKNOWN ? command.rawText : command.kind;
}
