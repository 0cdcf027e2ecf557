type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type StackId = Brand<string, 'StackId'>;
export type CardId = Brand<string, 'CardId'>;

export const asStackId = (value: string): StackId => value as StackId;
export const asCardId = (value: string): CardId => value as CardId;
