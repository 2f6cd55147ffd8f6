import { classifyCommand, commandText, interpretCommand, toRelayCommand } from './gt06.command';
import { CommandKind, GT06MessageType, ServerPacket } from './gt06.types';

const commandPacket = (text: string, serialNumber = 7): ServerPacket => ({
  protocolNumber: GT06MessageType.COMMAND_INFO,
  payload: Buffer.concat([Buffer.from(text, 'utf8'), Buffer.from([0x00, 0x00])]),
  serialNumber,
  checksumValid: true,
  rawFrame: Buffer.alloc(0),
});

describe('command interpreter', () => {
  it.each([
    ['Relay,1#', CommandKind.ENGINE_STOP],
    ['Relay,0#', CommandKind.ENGINE_RESUME],
    ['RELAY,1', CommandKind.ENGINE_STOP],
    ['relay 0#', CommandKind.ENGINE_RESUME],
    ['BLOQUEAR', CommandKind.ENGINE_STOP],
    ['DESLIGAR', CommandKind.ENGINE_STOP],
    ['stop engine', CommandKind.ENGINE_STOP],
    ['DESBLOQUEAR', CommandKind.ENGINE_STOP],
    ['LIGAR', CommandKind.ENGINE_RESUME],
    ['engine start', CommandKind.ENGINE_RESUME],
    ['WHERE#', CommandKind.UNKNOWN],
    ['', CommandKind.UNKNOWN],
  ])('classifies %p as %s', (text, kind) => {
    expect(classifyCommand(text)).toBe(kind);
  });

  it('matches keywords inside concatenated vendor text', () => {
    expect(classifyCommand('ENGINESTOP#')).toBe(CommandKind.ENGINE_STOP);
    expect(classifyCommand('STOPENGINE')).toBe(CommandKind.ENGINE_STOP);
    expect(classifyCommand('BLOQUEARMOTOR')).toBe(CommandKind.ENGINE_STOP);
    expect(classifyCommand('ENGINESTART')).toBe(CommandKind.ENGINE_RESUME);
  });

  it('gives the RELAY rules precedence over keywords', () => {
    expect(classifyCommand('Relay,1# STOP')).toBe(CommandKind.ENGINE_STOP);
    expect(classifyCommand('Relay,0# STOP')).toBe(CommandKind.ENGINE_RESUME);
  });

  it('falls back to keywords when RELAY carries no state digit', () => {
    expect(classifyCommand('RELAY STOP')).toBe(CommandKind.ENGINE_STOP);
    expect(classifyCommand('RELAY STATUS')).toBe(CommandKind.UNKNOWN);
  });

  it('strips null padding and surrounding whitespace', () => {
    expect(commandText(Buffer.from([0x00, 0x20, 0x48, 0x00, 0x69, 0x0a, 0x00]))).toBe('Hi');
  });

  it('keeps the serial and the original text of unknown commands', () => {
    const command = interpretCommand(commandPacket('  Param#  ', 0x0102));

    expect(command).toEqual({ rawText: 'Param#', kind: CommandKind.UNKNOWN, serialNumber: 0x0102 });
    expect(toRelayCommand(command)).toBe('Param#');
  });

  it('maps classified commands to the relay vocabulary', () => {
    expect(toRelayCommand(interpretCommand(commandPacket('Relay,1#')))).toBe('ENGINE_STOP');
    expect(toRelayCommand(interpretCommand(commandPacket('Relay,0#')))).toBe('ENGINE_RESUME');
  });
});
