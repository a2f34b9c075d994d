/**
 * SDK reference numbers used as PartyVInfo in ConcatKDF. They must match
 * the values compiled into the device SDKs byte for byte.
 */
export const SDK_REFERENCE_NUMBERS = {
  android: '3DS_LOA_SDK_JTPL_020200_00788',
  ios: '3DS_LOA_SDK_JTPL_020200_00805',
} as const;

/** Content encryption algorithm each platform's SDK uses. */
export const PLATFORM_ENC = {
  android: 'A128CBC-HS256',
  ios: 'A128GCM',
} as const;

export const JWE_KEY_MANAGEMENT_ALG = 'dir';
export const ACS_SIGNING_ALG = 'PS256';

// P-256 coordinates and scalars are 32 bytes
export const P256_COORDINATE_LENGTH = 32;
export const DERIVED_KEY_LENGTH = 32;
export const CBC_IV_LENGTH = 16;
export const GCM_IV_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;

/**
 * Static ACS signed content served when the ACS certificate or key cannot
 * be loaded. Its signature does not verify; clients that check it will
 * reject the challenge, which is the expected outcome in that mode.
 */
export const FALLBACK_ACS_SIGNED_CONTENT =
  'eyJhbGciOiJQUzI1NiIsInR5cCI6IkpXVCJ9.' +
  'eyJhY3NUcmFuc0lEIjoiMDAwMDAwMDAtMDAwMC00MDAwLTgwMDAtMDAwMDAwMDAwMDAwIiwiYWNzUmVmTnVtYmVyIjoiaXNzdWVyMSIsImFjc1VSTCI6Imh0dHA6Ly8xMjcuMC4wLjE6ODA4MC9jaGFsbGVuZ2UiLCJhY3NFcGhlbVB1YktleSI6eyJrdHkiOiJFQyIsImNydiI6IlAtMjU2IiwieCI6IkFTbTRyeDVYeFlsMnVYQ1I0b3FCcUlzMk1tQ0s4S29jUjVCam5rZk5zSlUiLCJ5IjoiY3lpTDhMZWo4NFViUXJVS0VVYkhBZkpfTjdUaXpVOUFhNEQyZWFZOE9MWSJ9fQ.' +
  '_17jtd8APO5DpQrclaGFSM17GHXTPZqCqFwiSs_1eAEBW0xv1_I8_4uDYTEtIU-3Aub18QG9mKyAgmUa1u7a7_DPZlF2okw4ulApRac7WisPYTqmAUEIGuMaHsBfv0h0EtUZGPHxeEu5HYFV93IIe-9bPNsBKdxgFIVTVjWZ4qp0IOb_E3_InFv9wbuB0tvxXNlsVvMcgpa-Z5NtUT6BeC5OQmfGVGqqRf-I_NIjRG2vNhlQ1TycWLNgJqR7xSzYNOv1UPcPjKyMRqFteQgytZIsy6qPnHxjz5rfNvonA9YI9h8ifHl6W__S4ypwwSmY7a3xa69Sr7fNjRbXoVXgtQ';
