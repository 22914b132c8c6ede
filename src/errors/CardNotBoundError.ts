export class CardNotBoundError extends Error {
  readonly cardId: number;

  constructor(cardId: number) {
    super(`No card bound with id ${cardId}`);
    this.name = 'CardNotBoundError';
    this.cardId = cardId;
  }
}
