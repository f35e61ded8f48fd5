/** An image already uploaded to the platform's image store. */
export interface Picture {
  url: string;
  width: number;
  height: number;
}

/** Response of the dynamic image upload endpoint */
export interface UploadImageResult {
  image_url: string;
  image_width: number;
  image_height: number;
}

export function pictureFromUpload(result: UploadImageResult): Picture {
  return {
    url: result.image_url,
    width: result.image_width,
    height: result.image_height,
  };
}
