export * from './screen.entity';
export * from './seat.entity';
export * from './show.entity';
export * from './seat-state.entity';
export * from './hold.entity';
export * from './booking.entity';
export * from './promo-code.entity';
