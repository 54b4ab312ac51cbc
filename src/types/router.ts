/**
 * Router domain enums, named after the firmware values they decode.
 */

/** Operation mode resolved from `sw_mode`, `wlc_psta` and `wlc_express`. */
export enum SwMode {
    /** Router */
    RT = 'rt',
    /** Repeater */
    RE = 're',
    /** Access Point */
    AP = 'ap',
    /** Media Bridge */
    MB = 'mb',
    /** Express Way 2.4 GHz */
    EW2 = 'ew2',
    /** Express Way 5 GHz */
    EW5 = 'ew5',
    /** Hotspot */
    HS = 'hs'
}

/** Band ids as reported by `wl_nband_info`. */
export const WIFI_BANDS: Readonly<Record<string, string>> = {
    '2': '2g',
    '1': '5g',
    '4': '6g',
    '6': '60g'
};

export enum DualWanMode {
    NONE = 'none',
    WAN = 'wan',
    LAN = 'lan',
    USB = 'usb',
    DSL = 'dsl'
}

export enum UsbDeviceType {
    STORAGE = 'storage',
    MODEM = 'modem',
    PRINTER = 'printer'
}
