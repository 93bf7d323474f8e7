import { IPaginationOptions } from './types/pagination-options';
import { InfinityPaginationResponseDto } from './dto/infinity-pagination-response.dto';

/**
 * Slice an already-ordered list into one page.
 */
export const infinityPagination = <T>(
  data: T[],
  options: IPaginationOptions,
): InfinityPaginationResponseDto<T> => {
  const skip = (options.page - 1) * options.limit;
  return {
    data: data.slice(skip, skip + options.limit),
    hasNextPage: data.length > skip + options.limit,
  };
};
