/**
 * Result keys shared by every traffic generator driver. Records handed back
 * to the benchmark framework use exactly these names.
 */
export const ResultsConstants = {
  TX_FRAMES: 'tx_frames',
  RX_FRAMES: 'rx_frames',
  TX_BYTES: 'tx_bytes',
  RX_BYTES: 'rx_bytes',
  PAYLOAD_ERR: 'payload_err',
  SEQ_ERR: 'seq_err',
  THROUGHPUT_TX_FPS: 'throughput_tx_fps',
  THROUGHPUT_RX_FPS: 'throughput_rx_fps',
  THROUGHPUT_TX_MBPS: 'throughput_tx_mbps',
  THROUGHPUT_RX_MBPS: 'throughput_rx_mbps',
  THROUGHPUT_TX_PERCENT: 'throughput_tx_percent',
  THROUGHPUT_RX_PERCENT: 'throughput_rx_percent',
  MIN_LATENCY_NS: 'min_latency_ns',
  MAX_LATENCY_NS: 'max_latency_ns',
  AVG_LATENCY_NS: 'avg_latency_ns',
} as const;

export type ResultKey = (typeof ResultsConstants)[keyof typeof ResultsConstants];

export type ResultRecord = Partial<Record<ResultKey, number>>;

export interface BurstResultRecord {
  [ResultsConstants.TX_FRAMES]: number;
  [ResultsConstants.RX_FRAMES]: number;
  [ResultsConstants.TX_BYTES]: number;
  [ResultsConstants.RX_BYTES]: number;
  [ResultsConstants.PAYLOAD_ERR]: number;
  [ResultsConstants.SEQ_ERR]: number;
}

export interface ThroughputResultRecord {
  [ResultsConstants.THROUGHPUT_TX_FPS]: number;
  [ResultsConstants.THROUGHPUT_RX_FPS]: number;
  [ResultsConstants.THROUGHPUT_TX_MBPS]: number;
  [ResultsConstants.THROUGHPUT_RX_MBPS]: number;
  [ResultsConstants.THROUGHPUT_TX_PERCENT]: number;
  [ResultsConstants.THROUGHPUT_RX_PERCENT]: number;
  [ResultsConstants.MIN_LATENCY_NS]: number;
  [ResultsConstants.MAX_LATENCY_NS]: number;
  [ResultsConstants.AVG_LATENCY_NS]: number;
}
