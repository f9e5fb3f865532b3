export { WEI_PER_ETHER, etherToWei, weiToEther } from "./units.js";
export { decodeHexBytes, normalizeHexBytes, shortenAddress, toAddress } from "./hex.js";
