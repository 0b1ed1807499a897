import { DiscoveryService, Reflector } from '@nestjs/core';
import { MachineRegistry } from '../../src/services/machine-registry.service';
import { MachineNotRegisteredError } from '../../src/errors/machine-not-registered.error';
import { DuplicateRegistrationError } from '../../src/errors/duplicate-registration.error';
import { MachineEntity } from '../../src/decorators/machine-entity.decorator';
import { defineMachine } from '../../src/engines/state-machine-definition';
import { createMockRegistry } from '../helpers';

const ticket = defineMachine({
  id: 'ticket',
  states: { open: { initial: true }, closed: { terminal: true } },
  events: ['close'],
  transitions: [{ from: 'open', event: 'close', to: 'closed' }],
});

class FakeTicket {}
class AnotherTicket {}

describe('MachineRegistry', () => {
  let registry: MachineRegistry;

  beforeEach(() => {
    registry = createMockRegistry();
  });

  it('should register and retrieve a machine by tableName', () => {
    registry.register('tickets', ticket, FakeTicket);

    expect(registry.get('tickets')).toEqual({
      tableName: 'tickets',
      definition: ticket,
      targetClass: FakeTicket,
    });
  });

  it('should return undefined for unregistered tableName', () => {
    expect(registry.get('nonexistent')).toBeUndefined();
  });

  it('should throw MachineNotRegisteredError from getOrThrow', () => {
    expect(() => registry.getOrThrow('missing')).toThrow(
      MachineNotRegisteredError,
    );
    expect(() => registry.getOrThrow('missing')).toThrow(
      'No state machine entity registered for table "missing".',
    );
  });

  it('should throw DuplicateRegistrationError on duplicate tableName', () => {
    registry.register('tickets', ticket, FakeTicket);

    expect(() => registry.register('tickets', ticket, AnotherTicket)).toThrow(
      DuplicateRegistrationError,
    );
    expect(() => registry.register('tickets', ticket, AnotherTicket)).toThrow(
      'Duplicate state machine table name "tickets". Both FakeTicket and AnotherTicket are registered with the same table name.',
    );
  });

  it('should refuse a table name that cannot be used in SQL', () => {
    expect(() =>
      registry.register('support-tickets', ticket, FakeTicket),
    ).toThrow(
      'Invalid table name "support-tickets". Only alphanumeric characters and underscores are allowed.',
    );
    expect(() => registry.register('1tickets', ticket, FakeTicket)).toThrow(
      'Invalid table name "1tickets".',
    );
    expect(registry.getAll()).toEqual([]);
  });

  it('should return all registrations via getAll', () => {
    registry.register('tickets', ticket, FakeTicket);
    registry.register('escalations', ticket, AnotherTicket);

    expect(registry.getAll().map((r) => r.tableName)).toEqual([
      'tickets',
      'escalations',
    ]);
  });

  it('should register decorated providers on module init', () => {
    @MachineEntity({ tableName: 'tickets', definition: ticket })
    class Ticket {}

    const discovery = {
      getProviders: () => [{ metatype: Ticket }, { metatype: FakeTicket }, {}],
    } as unknown as DiscoveryService;
    const discovered = new MachineRegistry(discovery, new Reflector());

    discovered.onModuleInit();

    expect(discovered.getAll()).toEqual([
      { tableName: 'tickets', definition: ticket, targetClass: Ticket },
    ]);
  });
});
