export type AttributeType = string | number | boolean;
export type AttributeValue = AttributeType | null;
export type Attributes = { [key: string]: AttributeValue };

export type ContextValue = string | number | boolean | null | string[];
export type Contexts = { [key: string]: ContextValue };
