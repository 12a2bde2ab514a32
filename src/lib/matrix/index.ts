export {
  Matrix,
  copyInto,
  createMatrix,
  multiply,
  sliceColumns,
  transpose,
} from "./matrix";
