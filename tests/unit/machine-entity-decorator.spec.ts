import 'reflect-metadata';
import { MachineEntity } from '../../src/decorators/machine-entity.decorator';
import type { MachineEntityMetadata } from '../../src/decorators/machine-entity.decorator';
import { defineMachine } from '../../src/engines/state-machine-definition';
import { MACHINE_ENTITY_METADATA } from '../../src/state-machine.constants';

const ticket = defineMachine({
  id: 'ticket',
  states: { open: { initial: true }, closed: { terminal: true } },
  events: ['close'],
  transitions: [{ from: 'open', event: 'close', to: 'closed' }],
});

function readMetadata(target: Function): MachineEntityMetadata | undefined {
  return Reflect.getMetadata(MACHINE_ENTITY_METADATA, target);
}

describe('@MachineEntity decorator', () => {
  it('should set metadata with explicit tableName', () => {
    @MachineEntity({ tableName: 'support_tickets', definition: ticket })
    class Ticket {}

    expect(readMetadata(Ticket)).toEqual({
      tableName: 'support_tickets',
      definition: ticket,
    });
  });

  it('should derive tableName from class name when not provided', () => {
    @MachineEntity({ definition: ticket })
    class BankTransaction {}

    expect(readMetadata(BankTransaction)?.tableName).toBe('bank_transactions');
  });

  it('should drop a Machine suffix when deriving', () => {
    @MachineEntity({ definition: ticket })
    class TicketMachine {}

    expect(readMetadata(TicketMachine)?.tableName).toBe('tickets');
  });

  it('should store the definition reference', () => {
    @MachineEntity({ definition: ticket })
    class TicketEntity {}

    expect(readMetadata(TicketEntity)?.definition).toBe(ticket);
  });
});
