/** Index of one of the three independent color channels. */
export type Channel = 0 | 1 | 2;

/** One value per channel, in red, green, blue order. */
export type ChannelTriple<T> = readonly [T, T, T];

export const CHANNELS: ChannelTriple<Channel> = [0, 1, 2];

/** Keys used for the channels in settings documents. */
export const CHANNEL_KEYS = ["red", "green", "blue"] as const;
