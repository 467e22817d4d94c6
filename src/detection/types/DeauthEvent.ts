/**
 * Link-layer broadcast address, as produced by the capture layer
 */
export const BROADCAST_ADDRESS = 'FF:FF:FF:FF:FF:FF';

/**
 * One observed 802.11 deauthentication frame, already parsed by the capture layer
 */
export interface DeauthEvent {
    /** Point in time the frame was observed (ms) */
    readonly timestamp: number;
    /** Source address of the frame, possibly spoofed */
    readonly transmitterAddress: string;
    /** Destination address of the frame */
    readonly destinationAddress: string;
    /** Reason code carried in the frame, advisory only */
    readonly reasonCode: number;
}
