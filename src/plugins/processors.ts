import type { ProcessorPlugin } from "@/types/plugins";
import {
  butterworthLowpass,
  detrendLinear,
  rollingMean,
  savitzkyGolay,
} from "@/utils/filters";
import { numberParam } from "@/utils/params";

export const butterworthProcessor: ProcessorPlugin = {
  name: "butter",
  description: "Butterworth Low-pass Filter",
  getParameters: () => [
    { name: "order", label: "Order", type: "int", default: 4, min: 1, max: 10 },
    {
      name: "cutoff",
      label: "Cutoff Freq",
      type: "float",
      default: 10.0,
      min: 0.1,
      max: 1000.0,
      suffix: " Hz",
    },
  ],
  process: (values, samplingRate, params) =>
    butterworthLowpass(
      values,
      samplingRate,
      numberParam(params, "cutoff", 10.0),
      numberParam(params, "order", 4),
    ),
};

export const savitzkyGolayProcessor: ProcessorPlugin = {
  name: "savitzky_golay",
  description: "Savitzky-Golay Filter",
  getParameters: () => [
    {
      name: "window_length",
      label: "Window Length (odd)",
      type: "int",
      default: 11,
      min: 3,
      max: 999,
      step: 2,
    },
    {
      name: "polyorder",
      label: "Poly Order",
      type: "int",
      default: 3,
      min: 1,
      max: 10,
    },
  ],
  process: (values, _samplingRate, params) =>
    savitzkyGolay(
      values,
      numberParam(params, "window_length", 11),
      numberParam(params, "polyorder", 3),
    ),
};

export const rollingMeanProcessor: ProcessorPlugin = {
  name: "rolling_mean",
  description: "Rolling Mean / Moving Average",
  getParameters: () => [
    {
      name: "window_size",
      label: "Window Size",
      type: "int",
      default: 5,
      min: 2,
      max: 1000,
    },
  ],
  process: (values, _samplingRate, params) =>
    rollingMean(values, numberParam(params, "window_size", 5)),
};

export const detrendProcessor: ProcessorPlugin = {
  name: "detrend",
  description: "Linear Detrend",
  getParameters: () => [],
  process: (values) => detrendLinear(values),
};

export const builtinProcessors: ProcessorPlugin[] = [
  butterworthProcessor,
  savitzkyGolayProcessor,
  rollingMeanProcessor,
  detrendProcessor,
];
